/**
 * Backup service
 *
 * Wires the validator, the initial copy, the change source and the watch
 * loop together for one source file.
 */

import { v4 as uuidv4 } from "uuid";
import { ChannelMessage, IChangeSource } from "../interfaces/IChangeSource";
import { ICopyExecutor } from "../interfaces/ICopyExecutor";
import { BackupLogger } from "../interfaces/ILogger";
import { ITargetValidator, WatchTarget } from "../interfaces/IWatchTarget";
import { WatchSetupError } from "../types";
import { BackupConfig } from "./ConfigLoader";
import { CopyExecutor } from "./CopyExecutor";
import { ErrorHandler } from "./ErrorHandler";
import { EventChannel } from "./EventChannel";
import { FileChangeSource } from "./FileChangeSource";
import { TargetValidator } from "./TargetValidator";
import { WatchLoop, WatchLoopStats } from "./WatchLoop";

/**
 * Collaborators the service builds by default
 */
export interface BackupServiceDependencies {
  validator?: ITargetValidator;
  executor?: ICopyExecutor;
  changeSource?: IChangeSource;
}

export class BackupService {
  readonly sessionId: string = uuidv4();
  private readonly config: BackupConfig;
  private readonly logger: BackupLogger;
  private readonly validator: ITargetValidator;
  private readonly executor: ICopyExecutor;
  private readonly changeSource: IChangeSource;
  private readonly channel = new EventChannel<ChannelMessage>();
  private loop: WatchLoop | null = null;
  private target: WatchTarget | null = null;

  constructor(
    config: BackupConfig,
    logger: BackupLogger,
    dependencies: BackupServiceDependencies = {}
  ) {
    this.config = config;
    this.logger = logger;
    this.validator = dependencies.validator ?? new TargetValidator(logger);
    this.executor = dependencies.executor ?? new CopyExecutor();
    this.changeSource = dependencies.changeSource ?? new FileChangeSource();
  }

  /** Target being mirrored, once `start()` has validated it */
  get watchTarget(): WatchTarget | null {
    return this.target;
  }

  /**
   * Validate the paths, make the first copy and subscribe to changes
   *
   * A missing source fails before the destination directory is touched.
   * A failed first copy is logged and does not prevent watching.
   *
   * @throws StartupError if a path fails validation
   * @throws WatchSetupError if the change subscription cannot be established
   */
  async start(
    sourcePath: string,
    destinationDir: string
  ): Promise<WatchTarget> {
    if (this.loop) {
      throw new WatchSetupError(
        `Watch session ${this.sessionId} already started`
      );
    }

    await this.validator.validateSource(sourcePath);
    await this.validator.prepareDestination(destinationDir);
    const target = this.validator.resolveWatchTarget(
      sourcePath,
      destinationDir
    );

    await this.initialSync(target);

    try {
      await this.changeSource.subscribe(target.sourcePath, this.channel, {
        debounceMs: this.config.debounceMs,
        readyTimeoutMs: this.config.readyTimeoutMs,
      });
    } catch (error) {
      this.logger.error(
        `Error adding path to watcher. ${ErrorHandler.formatError(error)}`
      );
      throw error instanceof WatchSetupError
        ? error
        : new WatchSetupError(ErrorHandler.formatError(error), error);
    }

    this.target = target;
    this.loop = new WatchLoop(target, this.executor, this.logger);
    this.logger.info(
      `Watch session ${this.sessionId}: mirroring \`${target.sourcePath}\` into \`${target.destinationFilePath}\``
    );
    return target;
  }

  /**
   * Run the watch loop
   *
   * Resolves only after `stop()`; a running watcher never closes its channel.
   */
  async run(): Promise<void> {
    if (!this.loop) {
      throw new WatchSetupError("Watch session has not been started");
    }
    await this.loop.run(this.channel);
  }

  /**
   * Stop watching and let `run()` finish with the messages already queued
   */
  async stop(): Promise<void> {
    await this.changeSource.close();
    this.channel.close();
  }

  getStats(): WatchLoopStats | null {
    return this.loop ? this.loop.getStats() : null;
  }

  private async initialSync(target: WatchTarget): Promise<void> {
    this.logger.debug(
      `Initial copy of \`${target.sourcePath}\` into \`${target.destinationFilePath}\``
    );

    const outcome = await this.executor.copy(
      target.sourcePath,
      target.destinationFilePath
    );
    if (outcome.ok) {
      this.logger.debug(`Copied ${outcome.bytesCopied} bytes`);
    } else {
      this.logger.debug(`${outcome.errorKind}: ${outcome.message}`);
      this.logger.error(`First copy failed. Reason: ${outcome.message}`);
    }
  }
}
