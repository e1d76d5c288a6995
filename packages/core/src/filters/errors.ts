// Custom error types for the filter framework
import type { ZodError } from 'zod';

/**
 * Base error for all filter-related errors
 */
export class FilterError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'FilterError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a filter reads an attribute that has no getter.
 * This is a misuse of the framework, not a data problem.
 */
export class UnsupportedCriterionError extends FilterError {
  constructor(public readonly attribute: string) {
    super(`Unsupported filter criterion: ${attribute}`);
    this.name = 'UnsupportedCriterionError';
  }
}

/**
 * Thrown when user-supplied criteria or a result limit fail validation
 */
export class InvalidCriteriaError extends FilterError {
  constructor(
    message: string,
    public readonly issues: ZodError['errors'] = [],
  ) {
    super(message);
    this.name = 'InvalidCriteriaError';
  }
}

/**
 * Check if an error is a FilterError or subclass
 */
export function isFilterError(error: unknown): error is FilterError {
  return error instanceof FilterError;
}
