import { parseArgs } from './cli.js';
import { ExitCode, isResetError } from './errors.js';
import type { Logger } from './logger.js';
import { runReset, type ResetDependencies } from './reset.js';

export interface CliDependencies extends ResetDependencies {
  writeOut?: (str: string) => void;
}

/**
 * Print a failure and pick the exit code for it
 */
export function reportError(err: unknown, logger: Logger): ExitCode {
  if (isResetError(err)) {
    logger.error(`❌ ${err.message}`);
    if (err.details) logger.error(err.details);
    if (err.hint) logger.hint(err.hint);
    return err.exitCode;
  }

  const message = err instanceof Error ? err.stack ?? err.message : String(err);
  logger.error(`❌ Unexpected error: ${message}`);
  return ExitCode.Unexpected;
}

/**
 * Run the command line end to end and return the process exit code
 */
export async function runCli(argv: string[], deps: CliDependencies): Promise<ExitCode> {
  try {
    const parsed = parseArgs(argv, deps.writeOut);
    if (parsed.action === 'help') {
      return ExitCode.Success;
    }
    await runReset(parsed.options, deps);
    return ExitCode.Success;
  } catch (err) {
    return reportError(err, deps.logger);
  } finally {
    deps.prompter.close();
  }
}
