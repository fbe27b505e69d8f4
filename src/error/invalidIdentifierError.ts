import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised before any request when an ID, slug or file hash is not
 * acceptable in a request path.
 */
export class InvalidIdentifierError extends Error {
  /** InvalidIdentifierError error-name */
  readonly name = 'InvalidIdentifierError';
  /** The rejected input */
  #identifier: string;

  constructor(identifier: string, message = `invalid identifier ${JSON.stringify(identifier)}`, opts?: ErrorOptions) {
    super(message, opts);
    this.#identifier = identifier;
  }

  get identifier(): string {
    return this.#identifier;
  }
}

/**
 * Type guard for {@link InvalidIdentifierError}.
 */
export function isInvalidIdentifierError(error: unknown): error is InvalidIdentifierError {
  return isErrorType(InvalidIdentifierError, error);
}

/**
 * Extract an {@link InvalidIdentifierError} from an unknown error value, following nested causes.
 */
export function getInvalidIdentifierError(error: unknown): null | InvalidIdentifierError {
  return unwrapErrorType(InvalidIdentifierError, error);
}
