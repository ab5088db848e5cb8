/**
 * Logging collaborator used by the validator, the watch loop and the service
 *
 * A pino logger satisfies this interface; tests pass an in-memory recorder.
 */
export interface BackupLogger {
  trace(message: string): void;
  debug(message: string): void;
  info(message: string): void;
  error(message: string): void;
}
