import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when no response was received: DNS, refused connection, TLS,
 * an aborted signal, or a body that could not be read.
 */
export class TransportError extends Error {
  /** TransportError error-name */
  readonly name = 'TransportError';
  /** Upper-cased HTTP method of the failed request */
  #method: string;
  /** Absolute URL of the failed request */
  #url: string;

  /** Creates a new instance of a TransportError, the underlying failure goes in `opts.cause` */
  constructor(message: string, method: string, url: string, opts?: ErrorOptions) {
    super(message, opts);
    this.#method = method.toUpperCase();
    this.#url = url;
  }

  get method(): string {
    return this.#method;
  }

  get url(): string {
    return this.#url;
  }
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): null | TransportError {
  return unwrapErrorType(TransportError, error);
}
