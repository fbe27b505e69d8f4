import { SerializationError } from '../error/serializationError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/** Values a filter may take. Everything but a string is sent as compact JSON. */
export type FilterValue = string | number | boolean | readonly string[] | readonly (readonly string[])[];

/** A named filter, `undefined` or `null` meaning "not set". */
export type QueryFilter = readonly [name: string, value: FilterValue | null | undefined];

/** Ordered filter list as handed to {@link encodeQuery}. */
export type QueryFilters = readonly QueryFilter[];

/**
 * Serializes a single filter value. Strings are passed through, so that
 * `index=downloads` is not sent as `index="downloads"`.
 */
function serialize(value: FilterValue): SafeWrap<Error, string> {
  if (typeof value === 'string') {
    return [null, value];
  }

  return safeWrap(() => JSON.stringify(value));
}

/**
 * Turns optional filters into query parameters.
 *
 * - Absent filters are omitted entirely, never sent empty.
 * - Lists and booleans become their JSON text (`["forge"]`, `true`), as the
 *   remote API expects, instead of repeated keys.
 * - Parameters keep the order of `filters`, names must be unique.
 */
export function encodeQuery(filters: QueryFilters): SafeWrap<SerializationError, URLSearchParams> {
  const params = new URLSearchParams();

  for (const [name, value] of filters) {
    if (value === undefined || value === null) {
      continue;
    }

    if (params.has(name)) {
      return [new SerializationError(`error encoding query, duplicate parameter ${JSON.stringify(name)}`), null];
    }

    if (typeof value === 'number' && !Number.isFinite(value)) {
      return [new SerializationError(`error encoding query parameter ${JSON.stringify(name)}, ${value} is not finite`), null];
    }

    const [errValue, serialized] = serialize(value);
    if (errValue) {
      return [new SerializationError(`error encoding query parameter ${JSON.stringify(name)}`, { cause: errValue }), null];
    }

    params.append(name, serialized);
  }

  return [null, params];
}

/**
 * Returns a copy of `url` carrying `params` as its query string.
 */
export function withQuery(url: URL, params: URLSearchParams): URL {
  const next = new URL(url);
  next.search = params.toString();
  return next;
}
