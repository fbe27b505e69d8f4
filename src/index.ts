/**
 * Root entrypoint: re-exports the client, resource APIs, schemas and error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export { ProjectApi, type SearchFilters, TagApi, UserApi, type VersionFilters, VersionApi } from './api/index.js';
export * from './core/index.js';
export * from './error/index.js';
export { FetchClient, mergeHeaderOptions } from './fetch/index.js';
export * from './structures/index.js';
export type {
  CallOptions,
  ClientConfig,
  FetchClientOptions,
  FetchClientProvider,
  FetchClientProviderDefinition,
  FetchImplementation,
  FetchOptions,
  HeaderOptions,
  UserAgentOptions,
} from './types/request.js';
export { type HashAlgorithm, validateHash, validateIdentifier, validateIdentifiers } from './utils/identifier.js';
export { buildPath } from './utils/path.js';
export { encodeQuery, type FilterValue, type QueryFilter, type QueryFilters, withQuery } from './utils/query.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
export type { SchemaType } from './utils/decode.js';
