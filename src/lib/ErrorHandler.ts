/**
 * Error handler for file-watcher-backup
 * Maps startup errors to exit statuses and copy errors to failure kinds
 */

import { CopyErrorKind } from "../interfaces/ICopyExecutor";
import {
  ExitCode,
  StartupError,
  ValidationError,
  WatchSetupError,
} from "../types";

/**
 * Error handler class
 */
export class ErrorHandler {
  /**
   * Exit status the process should terminate with for an error
   */
  static toExitCode(error: unknown): ExitCode {
    if (error instanceof StartupError) {
      return error.exitCode;
    }

    if (error instanceof WatchSetupError) {
      return ExitCode.IOERR;
    }

    if (error instanceof ValidationError) {
      return ExitCode.USAGE;
    }

    return ExitCode.SOFTWARE;
  }

  /**
   * Classify a failed copy from its Node.js error code
   */
  static classifyCopyError(error: unknown): CopyErrorKind {
    if (!this.isNodeError(error)) {
      return "io_error";
    }

    switch (error.code) {
      case "ENOENT":
        return "not_found";
      case "EACCES":
      case "EPERM":
      case "EROFS":
        return "permission_denied";
      case "ENOSPC":
      case "EDQUOT":
        return "disk_full";
      case "EISDIR":
        return "is_directory";
      case "ENOTDIR":
        return "not_directory";
      default:
        return "io_error";
    }
  }

  /**
   * Human-readable message for any thrown value
   */
  static formatError(error: unknown): string {
    if (
      typeof error === "object" &&
      error !== null &&
      "message" in error &&
      typeof error.message === "string"
    ) {
      return error.message;
    }
    return String(error);
  }

  /**
   * Check if error is a Node.js system error
   *
   * Checks the shape rather than the prototype: errors raised in another
   * realm (a vm context, a worker) are not `instanceof Error` here.
   */
  static isNodeError(error: unknown): error is NodeJS.ErrnoException {
    return (
      typeof error === "object" &&
      error !== null &&
      "code" in error &&
      typeof error.code === "string" &&
      error.code.startsWith("E")
    );
  }
}
