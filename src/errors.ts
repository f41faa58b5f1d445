/**
 * Process exit codes, one per failure class
 */
export enum ExitCode {
  Success = 0,
  Usage = 1,
  FixturesMissing = 4,
  ClientMissing = 5,
  Connectivity = 6,
  BatchFailed = 7,
  UserAborted = 8,
  InvalidSelection = 15,
  Unexpected = 70,
}

/**
 * A failure that ends the run with a specific exit code.
 * `hint` is printed under the message to tell the operator what to try next.
 */
export class ResetError extends Error {
  readonly exitCode: ExitCode;
  readonly hint?: string;
  readonly details?: string;

  constructor(
    message: string,
    exitCode: ExitCode,
    options: { hint?: string; details?: string } = {}
  ) {
    super(message);
    this.name = 'ResetError';
    this.exitCode = exitCode;
    this.hint = options.hint;
    this.details = options.details;
  }
}

export function isResetError(err: unknown): err is ResetError {
  return err instanceof ResetError;
}
