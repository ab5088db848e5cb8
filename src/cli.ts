#!/usr/bin/env node

/**
 * CLI entry point for file-watcher-backup
 */

import { CommanderError } from "commander";
import { Bootstrap, bootstrap, startFileWatcherBackup } from "./index";
import { ErrorHandler } from "./lib/ErrorHandler";
import { ExitCode, StartupError, WatchSetupError } from "./types";

let logger: Bootstrap["logger"] | null = null;

function fail(label: string, error: unknown): never {
  const message = `${label}: ${ErrorHandler.formatError(error)}`;
  if (logger) {
    logger.error(message);
  } else {
    console.error(`file-watcher-backup: ${message}`);
  }
  process.exit(ExitCode.SOFTWARE);
}

process.on("unhandledRejection", (reason) => {
  fail("Unhandled promise rejection", reason);
});

process.on("uncaughtException", (error) => {
  fail("Uncaught exception", error);
});

function initialize(): Bootstrap {
  try {
    return bootstrap(process.argv, process.env);
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed the usage message
      process.exit(error.exitCode);
    }
    console.error(`file-watcher-backup: ${ErrorHandler.formatError(error)}`);
    process.exit(ErrorHandler.toExitCode(error));
  }
}

async function main(): Promise<void> {
  const boot = initialize();
  logger = boot.logger;

  try {
    const service = await startFileWatcherBackup(boot);
    process.once("SIGINT", () => {
      service.stop().catch((error) => fail("Shutdown failed", error));
    });
    await service.run();
  } catch (error) {
    // Startup and watch setup failures are logged where they happen
    if (!(error instanceof StartupError || error instanceof WatchSetupError)) {
      boot.logger.error(ErrorHandler.formatError(error));
    }
    process.exit(ErrorHandler.toExitCode(error));
  }
}

void main();
