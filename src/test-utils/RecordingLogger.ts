/**
 * In-memory BackupLogger for tests
 */

import { BackupLogger } from "../interfaces/ILogger";

export type LogLevelName = "trace" | "debug" | "info" | "error";

export interface LogEntry {
  level: LogLevelName;
  message: string;
}

export class RecordingLogger implements BackupLogger {
  readonly entries: LogEntry[] = [];

  trace(message: string): void {
    this.entries.push({ level: "trace", message });
  }

  debug(message: string): void {
    this.entries.push({ level: "debug", message });
  }

  info(message: string): void {
    this.entries.push({ level: "info", message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", message });
  }

  /** Messages logged at one level, in order */
  messages(level: LogLevelName): string[] {
    return this.entries
      .filter((entry) => entry.level === level)
      .map((entry) => entry.message);
  }
}
