import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a path that cannot be placed below the endpoint.
 */
export class ConstructURLError extends Error {
  /** ConstructURLError error-name */
  readonly name = 'ConstructURLError';
  /** Endpoint the path was built against */
  #url: string;
  /** Offending segment, `null` when the endpoint itself is at fault */
  #segment: string | null;

  /** Creates a new instance of a ConstructURLError with the endpoint and segment involved */
  constructor(message: string, url: string, segment: string | null = null, opts?: ErrorOptions) {
    super(message, opts);
    this.#url = url;
    this.#segment = segment;
  }

  get url(): string {
    return this.#url;
  }

  get segment(): string | null {
    return this.#segment;
  }
}

/**
 * Extract an {@link ConstructURLError} from an unknown error value, following nested causes.
 */
export function getConstructURLError(error: unknown): null | ConstructURLError {
  return unwrapErrorType(ConstructURLError, error);
}

/**
 * Type guard for {@link ConstructURLError}.
 */
export function isConstructURLError(error: unknown): error is ConstructURLError {
  return isErrorType(ConstructURLError, error);
}
