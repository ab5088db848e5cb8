/**
 * File change source implementation
 *
 * Wraps Chokidar to watch exactly one file. Raw `change` notifications go
 * through a ChangeDebouncer; `add` and `unlink` pass straight through. Errors
 * before the watcher is ready fail the subscription, errors afterwards are
 * forwarded to the channel.
 */

import chokidar, { WatchOptions } from "chokidar";
import {
  ChannelMessage,
  IChangeSource,
  SubscribeOptions,
} from "../interfaces/IChangeSource";
import { WatchSetupError } from "../types";
import { ChangeDebouncer } from "./ChangeDebouncer";
import { ErrorHandler } from "./ErrorHandler";
import { EventChannel } from "./EventChannel";

/**
 * Default time to wait for the watcher to become ready
 */
export const DEFAULT_READY_TIMEOUT_MS = 5000;

/**
 * The part of a Chokidar watcher this module relies on
 */
export interface WatcherHandle {
  on(
    event: "add" | "change" | "unlink",
    listener: (path: string) => void
  ): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "ready", listener: () => void): unknown;
  close(): Promise<void>;
}

export type WatchFactory = (
  filePath: string,
  options: WatchOptions
) => WatcherHandle;

/**
 * Chokidar options for a single, non-recursive file watch
 *
 * `atomic` folds the unlink/add pair produced by editors that save through a
 * temporary file into a single `change`.
 */
export const WATCHER_OPTIONS: WatchOptions = {
  persistent: true,
  ignoreInitial: true,
  depth: 0,
  atomic: true,
  followSymlinks: true,
};

export class FileChangeSource implements IChangeSource {
  private readonly watchFactory: WatchFactory;
  private watcher: WatcherHandle | null = null;
  private debouncer: ChangeDebouncer | null = null;
  private watchedPath: string | null = null;

  constructor(
    watchFactory: WatchFactory = (filePath, options) =>
      chokidar.watch(filePath, options)
  ) {
    this.watchFactory = watchFactory;
  }

  /** Path currently watched, if any */
  get path(): string | null {
    return this.watchedPath;
  }

  async subscribe(
    filePath: string,
    channel: EventChannel<ChannelMessage>,
    options: SubscribeOptions
  ): Promise<void> {
    if (this.watcher) {
      throw new WatchSetupError(`Already watching \`${this.watchedPath}\``);
    }

    const debouncer = new ChangeDebouncer(options.debounceMs, (event) => {
      channel.send({ type: "event", event });
    });

    let watcher: WatcherHandle;
    try {
      watcher = this.watchFactory(filePath, { ...WATCHER_OPTIONS });
    } catch (error) {
      throw new WatchSetupError(
        `Failed to watch \`${filePath}\`: ${ErrorHandler.formatError(error)}`,
        error
      );
    }

    let ready = false;
    watcher.on("change", (changedPath) =>
      debouncer.push("write", changedPath)
    );
    watcher.on("add", (addedPath) => debouncer.push("create", addedPath));
    watcher.on("unlink", (removedPath) =>
      debouncer.push("remove", removedPath)
    );
    watcher.on("error", (error) => {
      if (ready) {
        channel.send({ type: "error", error });
      }
    });

    // Wait for watcher to be ready
    try {
      await new Promise<void>((resolve, reject) => {
        const timeout = setTimeout(() => {
          reject(new Error("Watcher initialization timeout"));
        }, options.readyTimeoutMs);

        watcher.on("ready", () => {
          clearTimeout(timeout);
          ready = true;
          resolve();
        });

        watcher.on("error", (error) => {
          clearTimeout(timeout);
          reject(error);
        });
      });
    } catch (error) {
      debouncer.cancel();
      await watcher.close();
      throw new WatchSetupError(
        `Failed to watch \`${filePath}\`: ${ErrorHandler.formatError(error)}`,
        error
      );
    }

    this.watcher = watcher;
    this.debouncer = debouncer;
    this.watchedPath = filePath;
  }

  async close(): Promise<void> {
    this.debouncer?.cancel();
    this.debouncer = null;

    const watcher = this.watcher;
    this.watcher = null;
    this.watchedPath = null;
    if (watcher) {
      await watcher.close();
    }
  }
}
