import type { Logger } from 'pino';
import { z } from 'zod';
import { ApiError } from '../error/apiError.js';
import { SerializationError } from '../error/serializationError.js';
import { TransportError } from '../error/transportError.js';
import type { DispatchError } from '../error/types.js';
import { mergeHeaderOptions } from '../fetch/utils.js';
import type {
  CallOptions,
  ClientConfig,
  FetchClientProviderDefinition,
  FetchOptions,
  HttpMethod,
} from '../types/request.js';
import { decode, type SchemaType } from '../utils/decode.js';
import { type SafeWrapAsync, safeWrap, safeWrapAsync } from '../utils/wrap.js';

/** What gets sent: GET never carries a body, POST may. */
export type DispatchRequest = { method: 'get' } | { method: 'post'; body?: unknown };

/** Error payload the remote service answers non-2xx statuses with. */
const errorPayloadSchema = z.object({
  error: z.string(),
  description: z.string().optional(),
});

/**
 * The single place where requests are sent and responses interpreted.
 *
 * - Attaches `Accept`, `User-Agent` and, when configured, `Authorization`.
 * - Serializes POST bodies as JSON.
 * - Decodes 2xx bodies with the schema of the call, anything else into an {@link ApiError}.
 *
 * No retries, caching or timeouts: one call is one round trip, and every
 * failure is returned to the caller as an error-first tuple.
 */
export class Dispatcher {
  /** Transport created from the configured provider. */
  #transport: FetchClientProviderDefinition;
  /** Shared, frozen client configuration. */
  #config: ClientConfig;
  #logger: Logger;

  constructor(config: ClientConfig) {
    this.#config = config;
    this.#logger = config.logger.child({ component: 'dispatcher' });
    this.#transport = new config.fetchProvider({
      headers: {
        Accept: 'application/json',
        'User-Agent': config.userAgent,
        ...(config.token !== null && { Authorization: config.token }),
      },
      ...(config.fetch && { fetch: config.fetch }),
    });
  }

  /** Endpoint every path of this client is built below. */
  get baseUrl(): string {
    return this.#config.baseUrl;
  }

  /**
   * Performs a GET request and decodes the response with `schema`.
   */
  get<Output>(url: URL, schema: SchemaType<Output>, opts?: CallOptions): SafeWrapAsync<DispatchError, Output> {
    return this.dispatch({ method: 'get' }, url, schema, opts);
  }

  /**
   * Performs a POST request with `body` as JSON and decodes the response with `schema`.
   */
  post<Output>(
    url: URL,
    body: unknown,
    schema: SchemaType<Output>,
    opts?: CallOptions,
  ): SafeWrapAsync<DispatchError, Output> {
    return this.dispatch({ method: 'post', body }, url, schema, opts);
  }

  /**
   * Sends one request and interprets its response.
   *
   * @param request - Method, and body for POST.
   * @param url - Absolute URL, path and query already built.
   * @param schema - Standard Schema the success body is decoded with.
   * @param opts - Per-call headers and abort signal.
   * @returns `[error, value]` where `error` is a {@link DispatchError}.
   */
  async dispatch<Output>(
    request: DispatchRequest,
    url: URL,
    schema: SchemaType<Output>,
    opts: CallOptions = {},
  ): SafeWrapAsync<DispatchError, Output> {
    const { method } = request;
    const href = url.href;
    const log = this.#logger.child({ method: method.toUpperCase(), url: href });
    const options: FetchOptions = { headers: opts.headers, signal: opts.signal };

    if (request.method === 'post' && request.body !== undefined) {
      const { body } = request;
      const [errBody, payload] = safeWrap(() => JSON.stringify(body));
      if (errBody) {
        const err = new SerializationError(`error serializing request body for ${href}`, { cause: errBody });
        log.debug({ err }, 'request body could not be serialized');
        return [err, null];
      }

      options.body = payload;
      options.headers = mergeHeaderOptions({ 'Content-Type': 'application/json' }, opts.headers);
    }

    log.debug('dispatching request');
    const [errSend, response] = await this.#send(method, href, options);
    if (errSend) {
      log.debug({ err: errSend }, 'request failed before a response');
      return [errSend, null];
    }

    const [errRead, text] = await safeWrapAsync(() => response.text());
    if (errRead) {
      const err = new TransportError(`error reading response body of ${href}`, method, href, { cause: errRead });
      log.debug({ err, status: response.status }, 'response body could not be read');
      return [err, null];
    }

    if (response.status < 200 || response.status > 299) {
      const err = await this.#toApiError(response.status, text);
      log.debug({ err, status: response.status }, 'remote service returned an error status');
      return [err, null];
    }

    const [errDecode, value] = await decode(text, schema);
    if (errDecode) {
      log.debug({ err: errDecode, status: response.status }, 'response body did not match schema');
      return [errDecode, null];
    }

    log.debug({ status: response.status }, 'request completed');
    return [null, value];
  }

  /**
   * Calls the transport, also catching providers that throw instead of
   * returning a tuple.
   */
  async #send(method: HttpMethod, url: string, options: FetchOptions): SafeWrapAsync<TransportError, Response> {
    const { body, ...rest } = options;
    const [errWrapped, wrapped] = await safeWrapAsync(() =>
      method === 'get' ? this.#transport.get(url, rest) : this.#transport.post(url, { ...rest, body }),
    );

    if (errWrapped) {
      return [new TransportError(`error calling transport ${method.toUpperCase()}`, method, url, { cause: errWrapped }), null];
    }

    return wrapped;
  }

  /**
   * Uses the service's `description` as reason when the body is its error
   * payload (the `error` code when the description is missing), the raw body
   * otherwise. The status is kept either way.
   */
  async #toApiError(status: number, text: string): Promise<ApiError> {
    const [errPayload, payload] = await decode(text, errorPayloadSchema);
    if (errPayload) {
      return new ApiError(status, text);
    }

    return new ApiError(status, payload.description ?? payload.error, payload.error);
  }
}
