/**
 * Common types for file-watcher-backup
 *
 * This module defines the error types shared by the startup path and the
 * watch loop. Startup errors carry the process exit status they map to;
 * every other error is handled where it happens.
 */

/**
 * Process exit statuses, following the BSD sysexits convention
 */
export enum ExitCode {
  /** Command line usage error */
  USAGE = 64,
  /** Input file missing */
  NOINPUT = 66,
  /** Internal software error */
  SOFTWARE = 70,
  /** Input/output error */
  IOERR = 74,
}

/**
 * Validation error - thrown when command line or environment input is invalid
 *
 * @example
 * ```typescript
 * throw new ValidationError("FILE_WATCHER_BACKUP_DEBOUNCE_MS must be a positive integer");
 * ```
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Startup error - thrown when the process cannot begin watching
 *
 * Raised for a missing or unreadable source file, a destination directory
 * that cannot be created, or a log sink that cannot be opened. The CLI exits
 * with `exitCode` without retrying.
 *
 * @example
 * ```typescript
 * throw new StartupError(`File \`${sourcePath}\` not found`, ExitCode.NOINPUT);
 * ```
 */
export class StartupError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode, cause?: unknown) {
    super(message, { cause });
    this.name = "StartupError";
    this.exitCode = exitCode;
  }
}

/**
 * Watch setup error - thrown when the change subscription cannot be established
 *
 * Distinct from delivery errors reported after the watcher is ready, which
 * the watch loop logs and absorbs.
 */
export class WatchSetupError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "WatchSetupError";
  }
}
