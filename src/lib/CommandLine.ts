/**
 * Command line parsing
 */

import { Command, OutputConfiguration } from "commander";

export const VERSION = "0.1.0";

export interface CommandLineOptions {
  /** File to watch */
  source: string;
  /** Directory receiving the backup */
  destination: string;
}

/**
 * Parse `process.argv`-style arguments
 *
 * `source` and `destination` can each be given positionally or with their
 * flag. Positional values fill whichever of the two the flags left unset, in
 * order, so `-d backup notes.txt` and `notes.txt backup` are equivalent.
 *
 * @throws CommanderError for usage errors, `--help` and `--version`
 */
export function parseCommandLine(
  argv: readonly string[],
  output?: OutputConfiguration
): CommandLineOptions {
  const program: Command = new Command()
    .name("file-watcher-backup")
    .description("Whenever a file changes, copy its content to a backup file.")
    .version(VERSION)
    .argument("[source]", "Source file to watch")
    .argument(
      "[destination]",
      "Target directory in which the file will be copied"
    )
    .option("-s, --source <FILE>", "Source file to watch")
    .option(
      "-d, --destination <DIR>",
      "Target directory in which the file will be copied"
    )
    .allowExcessArguments(false)
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }

  program.parse([...argv]);

  const flags = program.opts<Partial<CommandLineOptions>>();
  const positional = [...program.args];
  const source = flags.source ?? positional.shift();
  const destination = flags.destination ?? positional.shift();

  if (positional.length > 0) {
    program.error(`error: too many arguments: ${positional.join(" ")}`);
  }
  if (!source) {
    program.error("error: missing required argument 'source'");
  }
  if (!destination) {
    program.error("error: missing required argument 'destination'");
  }

  return { source, destination };
}
