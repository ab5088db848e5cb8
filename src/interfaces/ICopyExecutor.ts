/**
 * Copy executor interface
 */

/**
 * Classification of a failed copy, derived from the Node error code
 */
export type CopyErrorKind =
  | "not_found"
  | "permission_denied"
  | "disk_full"
  | "is_directory"
  | "not_directory"
  | "io_error";

/**
 * Result of a single copy attempt
 *
 * A failed outcome is only ever logged; it never stops the watch.
 */
export type CopyOutcome =
  | { ok: true; bytesCopied: number }
  | { ok: false; errorKind: CopyErrorKind; message: string; cause: unknown };

/**
 * Copy executor interface
 *
 * Copies the watched file over its backup, byte for byte. Implementations
 * must not throw: every failure is reported as a failed `CopyOutcome`.
 */
export interface ICopyExecutor {
  /**
   * Copy `sourcePath` to `destinationFilePath`, overwriting the destination
   *
   * @example
   * ```typescript
   * const outcome = await executor.copy("notes.txt", "backup/notes.txt");
   * if (outcome.ok) {
   *   console.log(`Copied ${outcome.bytesCopied} bytes`);
   * }
   * ```
   */
  copy(sourcePath: string, destinationFilePath: string): Promise<CopyOutcome>;
}
