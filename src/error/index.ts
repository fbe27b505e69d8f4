/**
 * Error entrypoint: exports the typed errors returned by the client and helpers for
 * identifying and unwrapping them. Use this when you only need error utilities.
 * @module
 */

/** Error representing a non-2xx response, and its guards. */
export { ApiError, getApiError, isApiError } from './apiError.js';
/** Error raised while building a client configuration. */
export { type ConfigField, ConfigError, getConfigError, isConfigError } from './configError.js';
/** Error representing a path that cannot be placed below the endpoint. */
export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
/** Error representing a success body that does not match its schema. */
export { DecodeError, getDecodeError, isDecodeError } from './decodeError.js';
/** Error raised locally for IDs, slugs and hashes that cannot go in a path. */
export {
  getInvalidIdentifierError,
  InvalidIdentifierError,
  isInvalidIdentifierError,
} from './invalidIdentifierError.js';
/** Generic type guard that matches an error constructor against an unknown error. */
export { isErrorType } from './isErrorType.js';
/** Error raised when a filter or body cannot be encoded. */
export { getSerializationError, isSerializationError, SerializationError } from './serializationError.js';
/** Error raised when no response was received. */
export { getTransportError, isTransportError, TransportError } from './transportError.js';
/** Unions of the errors returned by the dispatcher and by resource calls. */
export type { DispatchError, ModrinthError } from './types.js';
/** Recursively unwraps nested causes to find a specific error class. */
export { type ErrorClass, unwrapErrorType } from './unwrapErrorType.js';
