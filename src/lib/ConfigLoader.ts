/**
 * Configuration loader for file-watcher-backup
 */

import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { ValidationError } from "../types";
import { DEFAULT_DEBOUNCE_MS } from "./ChangeDebouncer";
import { DEFAULT_READY_TIMEOUT_MS } from "./FileChangeSource";

export const LOG_LEVELS = ["trace", "debug", "info", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface BackupConfig {
  /** Debounce window for write notifications */
  debounceMs: number;
  /** Maximum time to wait for the watcher to become ready */
  readyTimeoutMs: number;
  /** Directory holding the dated log files */
  logDir: string;
  /** Lowest level written to the log file */
  logLevel: LogLevel;
}

/**
 * Default log directory: ~/file-watcher-backup
 */
export function getDefaultLogDir(): string {
  return path.join(os.homedir(), "file-watcher-backup");
}

const positiveInt = (name: string) =>
  z.coerce
    .number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be positive`);

const envSchema = z.object({
  FILE_WATCHER_BACKUP_DEBOUNCE_MS: positiveInt(
    "FILE_WATCHER_BACKUP_DEBOUNCE_MS"
  ).default(DEFAULT_DEBOUNCE_MS),
  FILE_WATCHER_BACKUP_READY_TIMEOUT_MS: positiveInt(
    "FILE_WATCHER_BACKUP_READY_TIMEOUT_MS"
  ).default(DEFAULT_READY_TIMEOUT_MS),
  FILE_WATCHER_BACKUP_LOG_DIR: z.string().min(1).optional(),
  FILE_WATCHER_BACKUP_LOG_LEVEL: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default("trace"),
});

export class ConfigLoader {
  /**
   * Load configuration from environment variables
   *
   * Empty variables count as unset.
   * @throws ValidationError if a variable holds an invalid value
   */
  static loadConfig(env: NodeJS.ProcessEnv = process.env): BackupConfig {
    const relevant: Record<string, string> = {};
    for (const key of Object.keys(envSchema.shape)) {
      const value = env[key];
      if (value !== undefined && value.trim() !== "") {
        relevant[key] = value.trim();
      }
    }

    const parsed = envSchema.safeParse(relevant);
    if (!parsed.success) {
      const details = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ValidationError(`Invalid configuration: ${details}`);
    }

    return {
      debounceMs: parsed.data.FILE_WATCHER_BACKUP_DEBOUNCE_MS,
      readyTimeoutMs: parsed.data.FILE_WATCHER_BACKUP_READY_TIMEOUT_MS,
      logDir: parsed.data.FILE_WATCHER_BACKUP_LOG_DIR ?? getDefaultLogDir(),
      logLevel: parsed.data.FILE_WATCHER_BACKUP_LOG_LEVEL,
    };
  }
}
