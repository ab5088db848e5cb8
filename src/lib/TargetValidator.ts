/**
 * Target validator implementation
 */

import * as fs from "fs";
import * as path from "path";
import { BackupLogger } from "../interfaces/ILogger";
import { ITargetValidator, WatchTarget } from "../interfaces/IWatchTarget";
import { ExitCode, StartupError } from "../types";
import { ErrorHandler } from "./ErrorHandler";

export class TargetValidator implements ITargetValidator {
  private readonly logger: BackupLogger;

  constructor(logger: BackupLogger) {
    this.logger = logger;
  }

  /**
   * Fail early if the path is not an existing file the user can read
   */
  async validateSource(sourcePath: string): Promise<void> {
    this.logger.debug(`Input path: \`${sourcePath}\``);

    try {
      const stats = await fs.promises.stat(sourcePath);
      if (!stats.isFile()) {
        throw new StartupError(
          `Path \`${sourcePath}\` is not a regular file`,
          ExitCode.IOERR
        );
      }
      await fs.promises.access(sourcePath, fs.constants.R_OK);
    } catch (error) {
      if (error instanceof StartupError) {
        this.logger.error(error.message);
        throw error;
      }
      if (ErrorHandler.isNodeError(error) && error.code === "ENOENT") {
        this.logger.error(`File \`${sourcePath}\` not found`);
        this.logger.trace(ErrorHandler.formatError(error));
        throw new StartupError(
          `File \`${sourcePath}\` not found`,
          ExitCode.NOINPUT,
          error
        );
      }
      this.logger.error(`Error accessing file \`${sourcePath}\``);
      this.logger.trace(ErrorHandler.formatError(error));
      throw new StartupError(
        `Error accessing file \`${sourcePath}\`: ${ErrorHandler.formatError(
          error
        )}`,
        ExitCode.IOERR,
        error
      );
    }

    this.logger.info("Input file validated");
  }

  /**
   * Create the destination directory tree
   */
  async prepareDestination(destinationDir: string): Promise<void> {
    this.logger.debug(`Destination dir is: ${destinationDir}`);

    try {
      await fs.promises.mkdir(destinationDir, { recursive: true });
    } catch (error) {
      this.logger.debug(ErrorHandler.formatError(error));
      this.logger.error(`Destination directory \`${destinationDir}\` setup failed`);
      throw new StartupError(
        `Destination directory \`${destinationDir}\` setup failed: ${ErrorHandler.formatError(
          error
        )}`,
        ExitCode.IOERR,
        error
      );
    }

    this.logger.info(`Destination dir \`${destinationDir}\` setup completed`);
  }

  resolveWatchTarget(sourcePath: string, destinationDir: string): WatchTarget {
    return Object.freeze({
      sourcePath,
      destinationDir,
      destinationFilePath: path.join(destinationDir, path.basename(sourcePath)),
    });
  }
}
