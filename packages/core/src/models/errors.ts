// Custom error types for entity construction
import type { ZodError } from 'zod';

/**
 * Base error for all model-related errors
 */
export class ModelError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'ModelError';

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a source record fails field validation.
 * `field` names the first failing field, dotted for nested paths.
 */
export class RecordValidationError extends ModelError {
  constructor(
    message: string,
    public readonly entityType: 'NearEarthObject' | 'CloseApproach',
    public readonly field: string,
    public readonly issues: ZodError['errors'] = [],
  ) {
    super(message);
    this.name = 'RecordValidationError';
  }

  static fromZodError(
    entityType: 'NearEarthObject' | 'CloseApproach',
    error: ZodError,
  ): RecordValidationError {
    const [first] = error.errors;
    const field = first ? first.path.join('.') : '';
    const detail = first ? first.message : error.message;
    return new RecordValidationError(
      `Invalid ${entityType} field "${field}": ${detail}`,
      entityType,
      field,
      error.errors,
    );
  }
}

/**
 * Check if an error is a ModelError or subclass
 */
export function isModelError(error: unknown): error is ModelError {
  return error instanceof ModelError;
}
