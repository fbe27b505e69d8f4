import { TransportError } from '../error/transportError.js';
import type {
  FetchClientOptions,
  FetchClientProviderDefinition,
  FetchImplementation,
  FetchOptions,
  HeaderOptions,
} from '../types/request.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { mergeHeaderOptions } from './utils.js';

/**
 * Thin wrapper around the `fetch` API that:
 * - merges default and per-request headers,
 * - returns error-first tuples via {@link SafeWrapAsync}, with a
 *   {@link TransportError} when no response could be obtained.
 *
 * Every response is handed back untouched, whatever its status; reading the
 * status and body is left to the dispatcher.
 */
export class FetchClient implements FetchClientProviderDefinition {
  /** Default headers sent with every request. */
  #headers: HeaderOptions;
  /** Injected fetch, `null` to use the global one at call time. */
  #fetch: FetchImplementation | null;

  /** Creates a new instance of the fetch-client with default options */
  constructor(opts: FetchClientOptions = {}) {
    this.#headers = mergeHeaderOptions(opts.headers);
    this.#fetch = opts.fetch ?? null;
  }

  /**
   * Executes a GET request against an absolute URL.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options merged with the client's defaults.
   * @returns A promise resolving to `[error, response]`.
   */
  public get(url: string, opts: Omit<FetchOptions, 'body'>): SafeWrapAsync<TransportError, Response> {
    return this.#request('GET', url, { ...opts, body: undefined });
  }

  /**
   * Executes a POST request against an absolute URL.
   *
   * @param url - Absolute request URL.
   * @param opts - Request options, `body` usually serialized JSON.
   * @returns A promise resolving to `[error, response]`.
   */
  public post(url: string, opts: FetchOptions): SafeWrapAsync<TransportError, Response> {
    return this.#request('POST', url, opts);
  }

  /**
   * Core request implementation used by all HTTP verb helpers.
   *
   * Network, TLS, abort and invalid-header failures all surface as a
   * `TransportError` with the original error as cause.
   */
  async #request(method: 'GET' | 'POST', url: string, opts: FetchOptions): SafeWrapAsync<TransportError, Response> {
    const { headers, signal, body, ...rest } = opts;
    const fetchImpl: FetchImplementation = this.#fetch ?? fetch;

    const [err, res] = await safeWrapAsync(() =>
      fetchImpl(url, {
        ...rest,
        method,
        body,
        headers: mergeHeaderOptions(this.#headers, headers),
        ...(signal && { signal }),
      }),
    );

    if (err) {
      return [new TransportError(`error sending ${method} request in fetchClient`, method, url, { cause: err }), null];
    }

    return [null, res];
  }
}
