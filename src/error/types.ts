import type { ApiError } from './apiError.js';
import type { ConstructURLError } from './constructUrlError.js';
import type { DecodeError } from './decodeError.js';
import type { InvalidIdentifierError } from './invalidIdentifierError.js';
import type { SerializationError } from './serializationError.js';
import type { TransportError } from './transportError.js';

/** Everything the dispatcher can return instead of a value. */
export type DispatchError = TransportError | ApiError | DecodeError | SerializationError;

/** Everything a resource call can return instead of a value. */
export type ModrinthError = DispatchError | InvalidIdentifierError | ConstructURLError;
