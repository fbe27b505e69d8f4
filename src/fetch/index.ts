/**
 * Fetch entrypoint: exports the default transport and its supporting types.
 * @module
 */
export type { FetchClientOptions, FetchImplementation, FetchOptions } from '../types/request.js';
export { FetchClient } from './client.js';
export { mergeHeaderOptions } from './utils.js';
