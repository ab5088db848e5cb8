/**
 * Watch target interface
 *
 * Describes the single file being watched and where its backup copy lives.
 */

/**
 * The file being mirrored and its backup location
 *
 * `destinationFilePath` is derived from the other two fields when the target
 * is resolved and never changes afterwards.
 */
export interface WatchTarget {
  /** File being watched, as given on the command line */
  readonly sourcePath: string;
  /** Directory receiving the backup copy */
  readonly destinationDir: string;
  /** `destinationDir` joined with the base name of `sourcePath` */
  readonly destinationFilePath: string;
}

/**
 * Target validator interface
 *
 * Checks the command line paths before anything is watched or copied.
 * Every failure is a `StartupError` carrying the exit status the CLI should
 * use; nothing is retried.
 */
export interface ITargetValidator {
  /**
   * Confirm the source exists and is a readable regular file
   *
   * @param sourcePath - Path to the file to watch
   * @throws StartupError with ExitCode.NOINPUT if the file does not exist
   * @throws StartupError with ExitCode.IOERR for any other access failure
   *
   * @example
   * ```typescript
   * await validator.validateSource("notes.txt");
   * ```
   */
  validateSource(sourcePath: string): Promise<void>;

  /**
   * Create the destination directory and any missing ancestors
   *
   * An existing directory is not an error.
   *
   * @param destinationDir - Directory receiving the backup copy
   * @throws StartupError with ExitCode.IOERR if the directory cannot be created
   */
  prepareDestination(destinationDir: string): Promise<void>;

  /**
   * Build the watch target for a source file and destination directory
   *
   * @example
   * ```typescript
   * const target = validator.resolveWatchTarget("/tmp/notes.txt", "/tmp/backup");
   * // target.destinationFilePath === "/tmp/backup/notes.txt"
   * ```
   */
  resolveWatchTarget(sourcePath: string, destinationDir: string): WatchTarget;
}
