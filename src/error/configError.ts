import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/** Client properties that are checked at construction. */
export type ConfigField = 'baseUrl' | 'userAgent' | 'token';

/**
 * Error raised while building a client configuration.
 */
export class ConfigError extends Error {
  /** ConfigError error-name */
  readonly name = 'ConfigError';
  /** Property that failed */
  #field: ConfigField;

  constructor(message: string, field: ConfigField, opts?: ErrorOptions) {
    super(message, opts);
    this.#field = field;
  }

  get field(): ConfigField {
    return this.#field;
  }
}

/**
 * Type guard for {@link ConfigError}.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return isErrorType(ConfigError, error);
}

/**
 * Returns the {@link ConfigError} found in the `cause` chain of `error`, if any.
 */
export function getConfigError(error: unknown): null | ConfigError {
  return unwrapErrorType(ConfigError, error);
}
