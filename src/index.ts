/**
 * File Watcher Backup
 *
 * Watches a single file and keeps a copy of it in a backup directory,
 * refreshed after every burst of writes.
 */

export * from "./interfaces";
export * from "./lib";
export * from "./types";

import { Logger } from "pino";
import { BackupService } from "./lib/BackupService";
import { CommandLineOptions, parseCommandLine } from "./lib/CommandLine";
import { BackupConfig, ConfigLoader } from "./lib/ConfigLoader";
import { createLogger } from "./lib/Logger";

/**
 * Everything the process needs before a watch session can start
 */
export interface Bootstrap {
  options: CommandLineOptions;
  config: BackupConfig;
  logger: Logger;
}

/**
 * Parse the arguments, load the configuration and open the log sinks
 *
 * @throws CommanderError for usage errors, `--help` and `--version`
 * @throws ValidationError if the environment holds an invalid setting
 * @throws StartupError if the log file cannot be opened
 */
export function bootstrap(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Bootstrap {
  const options = parseCommandLine(argv);
  const config = ConfigLoader.loadConfig(env);
  const logger = createLogger(config);
  return { options, config, logger };
}

/**
 * Create a backup service and start watching the configured source
 */
export async function startFileWatcherBackup(
  boot: Bootstrap
): Promise<BackupService> {
  const service = new BackupService(boot.config, boot.logger);
  await service.start(boot.options.source, boot.options.destination);
  return service;
}
