/**
 * Watch loop
 *
 * Single consumer of the change channel. Each debounced `write` event
 * triggers one copy of the watched file over its backup; the next message is
 * not taken until that copy has finished, so copies never overlap. A failed
 * copy is logged and the loop goes back to waiting.
 */

import { ChangeEvent, ChannelMessage } from "../interfaces/IChangeSource";
import { CopyOutcome, ICopyExecutor } from "../interfaces/ICopyExecutor";
import { BackupLogger } from "../interfaces/ILogger";
import { WatchTarget } from "../interfaces/IWatchTarget";
import { ErrorHandler } from "./ErrorHandler";
import { EventChannel } from "./EventChannel";

export type WatchLoopState = "idle" | "copying";

/**
 * Counters kept while the loop runs
 */
export interface WatchLoopStats {
  /** Messages of type "event" received */
  eventsReceived: number;
  /** Events that did not trigger a copy */
  eventsIgnored: number;
  copiesAttempted: number;
  copiesSucceeded: number;
  copiesFailed: number;
  /** Delivery errors reported through the channel */
  channelErrors: number;
  /** Time of the last successful copy (ms since epoch) */
  lastCopyAt: number | null;
}

export class WatchLoop {
  private readonly target: WatchTarget;
  private readonly executor: ICopyExecutor;
  private readonly logger: BackupLogger;
  private _state: WatchLoopState = "idle";
  private stats: WatchLoopStats = {
    eventsReceived: 0,
    eventsIgnored: 0,
    copiesAttempted: 0,
    copiesSucceeded: 0,
    copiesFailed: 0,
    channelErrors: 0,
    lastCopyAt: null,
  };

  constructor(
    target: WatchTarget,
    executor: ICopyExecutor,
    logger: BackupLogger
  ) {
    this.target = target;
    this.executor = executor;
    this.logger = logger;
  }

  get state(): WatchLoopState {
    return this._state;
  }

  getStats(): WatchLoopStats {
    return { ...this.stats };
  }

  /**
   * Consume messages until the channel is closed
   *
   * The channel behind a running watcher is never closed, so in normal
   * operation this never resolves.
   */
  async run(channel: EventChannel<ChannelMessage>): Promise<void> {
    for await (const message of channel) {
      if (message.type === "error") {
        this.stats.channelErrors++;
        this.logger.error(`Watch error. ${message.error.message}`);
        continue;
      }

      await this.handleEvent(message.event);
    }
  }

  /**
   * Apply one change event to the state machine
   */
  async handleEvent(event: ChangeEvent): Promise<void> {
    this.stats.eventsReceived++;

    switch (event.kind) {
      case "write":
        await this.copy();
        return;
      case "remove":
        this.stats.eventsIgnored++;
        this.logger.error(
          `Source \`${event.path}\` was removed; the backup will stay stale until it reappears`
        );
        return;
      case "create":
        this.stats.eventsIgnored++;
        this.logger.trace(`Ignoring ${event.kind} event for \`${event.path}\``);
        return;
    }
  }

  private async copy(): Promise<void> {
    this._state = "copying";
    this.stats.copiesAttempted++;

    let outcome: CopyOutcome;
    try {
      outcome = await this.executor.copy(
        this.target.sourcePath,
        this.target.destinationFilePath
      );
    } catch (error) {
      outcome = {
        ok: false,
        errorKind: ErrorHandler.classifyCopyError(error),
        message: ErrorHandler.formatError(error),
        cause: error,
      };
    }

    if (outcome.ok) {
      this.stats.copiesSucceeded++;
      this.stats.lastCopyAt = Date.now();
      this.logger.debug(`Copied ${outcome.bytesCopied} bytes`);
    } else {
      this.stats.copiesFailed++;
      this.logger.debug(`${outcome.errorKind}: ${outcome.message}`);
      this.logger.error(`Copy failed. Reason: ${outcome.message}`);
    }

    this._state = "idle";
  }
}
