import type { HeaderOptions } from '../types/request.js';

type HeaderEntry = readonly [name: string, value: string | null | undefined];

/**
 * Normalizes the different header container shapes into entries.
 */
function toEntries(headers?: HeaderOptions): HeaderEntry[] {
  if (!headers) {
    return [];
  }

  if (headers instanceof Headers) {
    return [...headers.entries()];
  }

  if (Array.isArray(headers)) {
    return headers.map(([name, value]): HeaderEntry => [name, value]);
  }

  return Object.entries(headers);
}

/**
 * Merge header containers left to right into a single `Headers` instance.
 *
 * Later containers win. A `null` or `undefined` value removes the header set
 * by an earlier container, so a call can drop e.g. a default `Authorization`.
 */
export function mergeHeaderOptions(...containers: (HeaderOptions | undefined)[]): Headers {
  const merged = new Headers();

  for (const container of containers) {
    for (const [name, value] of toEntries(container)) {
      if (value == null) {
        merged.delete(name);
        continue;
      }

      merged.set(name, value);
    }
  }

  return merged;
}
