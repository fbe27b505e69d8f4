import type { Dispatcher, DispatchRequest } from '../core/dispatcher.js';
import type { ModrinthError } from '../error/types.js';
import type { CallOptions } from '../types/request.js';
import type { SchemaType } from '../utils/decode.js';
import { validateIdentifiers } from '../utils/identifier.js';
import { buildPath } from '../utils/path.js';
import { encodeQuery, type QueryFilters, withQuery } from '../utils/query.js';
import type { SafeWrap, SafeWrapAsync } from '../utils/wrap.js';

/** Description of one remote operation. */
export interface Route {
  /** Path below the endpoint, e.g. `['user', id, 'projects']`. */
  segments: readonly string[];
  /** Identifiers that must pass validation before anything is sent. */
  ids?: readonly string[];
  /** Optional filters, sent as query parameters when present. */
  query?: QueryFilters;
}

/**
 * Shared plumbing of the resource APIs: every call validates its identifiers,
 * builds its path and query, then hands over to the {@link Dispatcher}.
 */
export abstract class ResourceApi {
  protected readonly dispatcher: Dispatcher;

  constructor(dispatcher: Dispatcher) {
    this.dispatcher = dispatcher;
  }

  /** Issues a GET for `route`, decoding the response with `schema`. */
  protected read<Output>(
    route: Route,
    schema: SchemaType<Output>,
    opts?: CallOptions,
  ): SafeWrapAsync<ModrinthError, Output> {
    return this.#call(route, { method: 'get' }, schema, opts);
  }

  /** Issues a POST for `route` with `body` as JSON. */
  protected write<Output>(
    route: Route,
    body: unknown,
    schema: SchemaType<Output>,
    opts?: CallOptions,
  ): SafeWrapAsync<ModrinthError, Output> {
    return this.#call(route, { method: 'post', body }, schema, opts);
  }

  /**
   * Batch-by-ID lookup: every ID is validated first, then all of them travel
   * as one JSON array in the `ids` parameter of a single GET. The service
   * does not promise to answer in the order asked.
   */
  protected batch<Output>(
    collection: string,
    ids: readonly string[],
    schema: SchemaType<Output>,
    opts?: CallOptions,
  ): SafeWrapAsync<ModrinthError, Output> {
    return this.#call({ segments: [collection], ids, query: [['ids', ids]] }, { method: 'get' }, schema, opts);
  }

  #resolve(route: Route): SafeWrap<ModrinthError, URL> {
    const [errIds] = validateIdentifiers(route.ids ?? []);
    if (errIds) {
      return [errIds, null];
    }

    const [errPath, url] = buildPath(this.dispatcher.baseUrl, route.segments);
    if (errPath) {
      return [errPath, null];
    }

    if (!route.query) {
      return [null, url];
    }

    const [errQuery, params] = encodeQuery(route.query);
    if (errQuery) {
      return [errQuery, null];
    }

    return [null, withQuery(url, params)];
  }

  async #call<Output>(
    route: Route,
    request: DispatchRequest,
    schema: SchemaType<Output>,
    opts?: CallOptions,
  ): SafeWrapAsync<ModrinthError, Output> {
    const [errUrl, url] = this.#resolve(route);
    if (errUrl) {
      return [errUrl, null];
    }

    return this.dispatcher.dispatch(request, url, schema, opts);
  }
}
