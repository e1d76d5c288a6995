// Custom error types for building the linking index

/**
 * Base error for all index-related errors
 */
export class IndexError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'IndexError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when two NEOs in the source collection share a designation
 */
export class DuplicateDesignationError extends IndexError {
  constructor(public readonly designation: string) {
    super(`Duplicate NEO designation: ${designation}`);
    this.name = 'DuplicateDesignationError';
  }
}

/**
 * Check if an error is an IndexError or subclass
 */
export function isIndexError(error: unknown): error is IndexError {
  return error instanceof IndexError;
}
