/**
 * Logger factory
 *
 * Builds the process-wide pino logger: a dated file under the log directory
 * at the configured level, plus a pretty-printed terminal stream at `debug`
 * when stdout is a TTY. The core only sees the BackupLogger interface.
 */

import * as fs from "fs";
import * as path from "path";
import pino, { Logger, StreamEntry } from "pino";
import pretty from "pino-pretty";
import { ExitCode, StartupError } from "../types";
import { BackupConfig, LOG_LEVELS, LogLevel } from "./ConfigLoader";
import { ErrorHandler } from "./ErrorHandler";

const TERMINAL_LEVEL: LogLevel = "debug";

export interface LoggerOptions {
  /** Write to the terminal as well (defaults to whether stdout is a TTY) */
  terminal?: boolean;
  /** Date used to name the log file */
  now?: Date;
}

/**
 * Log file name for a given day, e.g. `2024-01-05.log` (local time)
 */
export function logFileName(date: Date = new Date()): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}-${month}-${day}.log`;
}

function lowestLevel(levels: LogLevel[]): LogLevel {
  return levels.reduce((lowest, level) =>
    LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(lowest) ? level : lowest
  );
}

/**
 * Create the application logger
 *
 * @throws StartupError with ExitCode.IOERR if the log file cannot be opened
 */
export function createLogger(
  config: BackupConfig,
  options: LoggerOptions = {}
): Logger {
  const terminal = options.terminal ?? process.stdout.isTTY === true;
  const logFilePath = path.join(config.logDir, logFileName(options.now));

  let fd: number;
  try {
    fs.mkdirSync(config.logDir, { recursive: true });
    fd = fs.openSync(logFilePath, "a");
  } catch (error) {
    throw new StartupError(
      `Log file \`${logFilePath}\` could not be opened: ${ErrorHandler.formatError(
        error
      )}`,
      ExitCode.IOERR,
      error
    );
  }

  const streams: StreamEntry[] = [
    { level: config.logLevel, stream: pino.destination({ fd, sync: true }) },
  ];
  if (terminal) {
    streams.push({
      level: TERMINAL_LEVEL,
      stream: pretty({ colorize: true, ignore: "pid,hostname" }),
    });
  }

  return pino(
    {
      level: lowestLevel(
        terminal ? [config.logLevel, TERMINAL_LEVEL] : [config.logLevel]
      ),
      base: { service: "file-watcher-backup" },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams)
  );
}
