/**
 * Core entrypoint: exports the client, its configuration and the dispatcher.
 * Import from here if you only need the client without error helpers.
 * @module
 */

/**
 * Typed client exposing `users`, `projects`, `versions` and `tags`.
 */
export { ModrinthClient } from './client.js';

/**
 * Builds and validates the frozen configuration a client runs on.
 */
export {
  type ClientConfigProps,
  createClientConfig,
  DEFAULT_BASE_URL,
  DEFAULT_USER_AGENT,
  formatUserAgent,
} from './config.js';

/**
 * Sends requests and interprets responses, for calls the resource APIs do not cover.
 */
export { Dispatcher, type DispatchRequest } from './dispatcher.js';
