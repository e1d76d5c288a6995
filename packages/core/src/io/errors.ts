// Custom error types for reading and writing data files

/**
 * Base error for all file I/O errors
 */
export class IoError extends Error {
  constructor(
    message: string,
    public readonly path: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'IoError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

/**
 * Thrown when a source file cannot be read or a record in it is malformed.
 * `row` is the 1-based data row (header excluded) when a single record failed.
 */
export class ExtractError extends IoError {
  constructor(
    message: string,
    path: string,
    public readonly row?: number,
    cause?: Error,
  ) {
    super(message, path, cause);
    this.name = 'ExtractError';
  }
}

/**
 * Thrown when results cannot be written to the output file
 */
export class WriteError extends IoError {
  constructor(message: string, path: string, cause?: Error) {
    super(message, path, cause);
    this.name = 'WriteError';
  }
}

/**
 * Check if an error is an IoError or subclass
 */
export function isIoError(error: unknown): error is IoError {
  return error instanceof IoError;
}

/**
 * Normalize an unknown thrown value to an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
