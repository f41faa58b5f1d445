import { Command, CommanderError, InvalidArgumentError, Option } from 'commander';
import { toPort, type CliOptions } from './config/index.js';
import { ExitCode, ResetError } from './errors.js';

export type ParsedArgs =
  | { action: 'run'; options: CliOptions }
  | { action: 'help' };

function flagValue(value: string): string {
  if (value.trim() === '') {
    throw new InvalidArgumentError('A value is required.');
  }
  if (value.startsWith('-')) {
    throw new InvalidArgumentError(`Expected a value but got '${value}'.`);
  }
  return value;
}

function portValue(value: string): number {
  const port = toPort(flagValue(value));
  if (port === undefined) {
    throw new InvalidArgumentError('Port must be a number between 1 and 65535.');
  }
  return port;
}

export function createProgram(writeOut: (str: string) => void = (str) => process.stdout.write(str)): Command {
  return new Command()
    .name('dbreset')
    .description(
      'Rebuild a local MySQL database from the SQL files in create/ and insert/.\n' +
        'Fixture directories are looked up in ./, ./sql/ and ./fixtures/sql/.'
    )
    .addOption(
      new Option('--fresh <name>', 'delete schema <name> before loading, without asking')
        .argParser(flagValue)
        .conflicts('initial')
    )
    .addOption(new Option('--user <name>', 'MySQL admin user (default: root)').argParser(flagValue))
    .addOption(new Option('--password <pass>', 'MySQL admin password (prompted when omitted)').argParser(flagValue))
    .addOption(new Option('--host <host>', 'MySQL host (default: 127.0.0.1)').argParser(flagValue))
    .addOption(new Option('--port <port>', 'MySQL port (default: 3306)').argParser(portValue))
    .option('--no-insert', 'run the create scripts only')
    .option('--initial', 'first run: never delete a schema, skip the prompt')
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut,
      writeErr: writeOut,
      outputError: () => {},
    });
}

/**
 * Parse the command-line arguments (without node and script path).
 * Usage errors are raised as ResetError before anything else runs.
 */
export function parseArgs(argv: string[], writeOut?: (str: string) => void): ParsedArgs {
  const program = createProgram(writeOut);

  try {
    program.parse(argv, { from: 'user' });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) {
        return { action: 'help' };
      }
      throw new ResetError(err.message.replace(/^error: /, ''), ExitCode.Usage, {
        hint: 'Run dbreset --help for usage.',
      });
    }
    throw err;
  }

  return { action: 'run', options: program.opts<CliOptions>() };
}
