import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when an outgoing filter value or request body cannot be encoded.
 */
export class SerializationError extends Error {
  /** SerializationError error-name */
  readonly name = 'SerializationError';
}

/**
 * Type guard for {@link SerializationError}.
 */
export function isSerializationError(error: unknown): error is SerializationError {
  return isErrorType(SerializationError, error);
}

/**
 * Returns the {@link SerializationError} found in the `cause` chain of `error`, if any.
 */
export function getSerializationError(error: unknown): null | SerializationError {
  return unwrapErrorType(SerializationError, error);
}
