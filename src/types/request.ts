import type { Logger } from 'pino';
import type { TransportError } from '../error/transportError.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** Header options accepted by the transport, `null` removes a default header. */
export type HeaderOptions = NonNullable<RequestInit['headers']> | Record<string, string | null | undefined>;

/** HTTP methods used by the remote API. */
export type HttpMethod = 'get' | 'post';

/** Options to pass in for each transport request */
export interface FetchOptions extends Omit<RequestInit, 'headers' | 'method'> {
  /** Headers merged with provider defaults. */
  headers?: HeaderOptions;
  /** Abort signal to cancel the request. */
  signal?: AbortSignal;
}

/** Per-call options accepted by the dispatcher and every resource call. */
export type CallOptions = Pick<FetchOptions, 'headers' | 'signal'>;

/** Function with the shape of the global `fetch`, narrowed to what the transport calls. */
export type FetchImplementation = (input: string, init: RequestInit) => Promise<Response>;

/** Options to configure a transport provider. */
export interface FetchClientOptions {
  /** Default headers sent with every request. */
  headers?: HeaderOptions;
  /** Replaces the global `fetch`, e.g. with a proxy-aware or in-process implementation. */
  fetch?: FetchImplementation;
}

/** Contract for HTTP transports used by the dispatcher. */
export interface FetchClientProviderDefinition {
  /** Executes a GET request, never with a body. */
  get: (url: string, options: Omit<FetchOptions, 'body'>) => SafeWrapAsync<TransportError, Response>;
  /** Executes a POST request. */
  post: (url: string, options: FetchOptions) => SafeWrapAsync<TransportError, Response>;
}

/** Factory signature for constructing transports. */
export interface FetchClientProvider {
  /** Creates a new transport with default options */
  new (opts: FetchClientOptions): FetchClientProviderDefinition;
}

/** Identification sent as the `User-Agent` of every request. */
export interface UserAgentOptions {
  /** Name of the consuming application, e.g. `my-launcher`. */
  name: string;
  /** Version of the consuming application. */
  version?: string;
  /** Contact address, email or URL, the API operators may use. */
  contact?: string;
}

/**
 * Immutable configuration shared read-only by every call of a client.
 * Built by `createClientConfig`.
 */
export interface ClientConfig {
  /** Absolute endpoint, always ending in `/`. */
  readonly baseUrl: string;
  /** Rendered `User-Agent` header value. */
  readonly userAgent: string;
  /** Value of the `Authorization` header, `null` for anonymous calls. */
  readonly token: string | null;
  /** Transport class instantiated by the dispatcher. */
  readonly fetchProvider: FetchClientProvider;
  /** Implementation handed to the transport instead of the global `fetch`. */
  readonly fetch: FetchImplementation | null;
  /** Logger receiving debug records of every dispatch. */
  readonly logger: Logger;
}
