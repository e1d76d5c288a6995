// Error types for the command-line front end

/**
 * Base error class for all command-line errors
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly exitCode = 1,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'CliError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when the command line cannot be understood
 */
export class UsageError extends CliError {
  constructor(
    message: string,
    public readonly option?: string,
  ) {
    super(message, 2);
    this.name = 'UsageError';
  }
}

/**
 * Check if an error is a CliError or subclass
 */
export function isCliError(error: unknown): error is CliError {
  return error instanceof CliError;
}
