/**
 * CLI error types
 *
 * Each error carries the process exit status it maps to.
 */

/** sysexits.h codes used by the driver */
export const ExitCode = {
  OK: 0,
  USAGE: 64,
  DATA_ERROR: 65,
  NO_INPUT: 66,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Base class for errors that end the command
 */
export abstract class CliError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Thrown when the command line itself is wrong
 */
export class UsageError extends CliError {
  readonly exitCode = ExitCode.USAGE;
}

/**
 * Thrown when a script file cannot be read
 */
export class SourceReadError extends CliError {
  readonly exitCode = ExitCode.NO_INPUT;
  /** Path as given on the command line */
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not read ${path}: ${reason}`, { cause });
    this.path = path;
  }
}
