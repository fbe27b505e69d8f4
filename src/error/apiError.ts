import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a non-2xx response from the remote service.
 *
 * `reason` is the `description` of the service's error payload when the body
 * decodes as one, otherwise the raw body text. `status` is always kept.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  readonly name = 'ApiError';
  /** HTTP status of the response */
  #status: number;
  /** Human readable reason */
  #reason: string;
  /** Machine readable `error` code from the payload, if any */
  #code: string | null;

  /** Creates a new instance of an ApiError from the response status and the decoded reason */
  constructor(status: number, reason: string, code: string | null = null, opts?: ErrorOptions) {
    super(`error response ${status}${code ? ` (${code})` : ''}: ${reason || 'empty body'}`, opts);
    this.#status = status;
    this.#reason = reason;
    this.#code = code;
  }

  get status(): number {
    return this.#status;
  }

  get reason(): string {
    return this.#reason;
  }

  get code(): string | null {
    return this.#code;
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | ApiError {
  return unwrapErrorType(ApiError, error);
}
