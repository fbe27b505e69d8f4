import { ConstructURLError } from '../error/constructUrlError.js';
import { type SafeWrap, safeWrap } from './wrap.js';

/**
 * Resolves an ordered list of path segments below an endpoint.
 *
 * Every segment is escaped on its own with URI component escaping, so a `/`
 * inside a segment becomes `%2F` and never adds a path level. Segments the
 * URL parser would drop or collapse (empty, `.`, `..`) are refused.
 *
 * @example
 * buildPath('https://api.modrinth.com/v2/', ['user', 'TEZXhE2U', 'projects']);
 * // [null, URL { href: 'https://api.modrinth.com/v2/user/TEZXhE2U/projects' }]
 */
export function buildPath(endpoint: string, segments: readonly string[]): SafeWrap<ConstructURLError, URL> {
  const base = endpoint.endsWith('/') ? endpoint : `${endpoint}/`;

  for (const segment of segments) {
    if (segment === '' || segment === '.' || segment === '..') {
      return [new ConstructURLError(`error building path, unusable segment ${JSON.stringify(segment)}`, base, segment), null];
    }
  }

  const escaped: string[] = [];
  for (const segment of segments) {
    const [errEscape, part] = safeWrap(() => encodeURIComponent(segment));
    if (errEscape) {
      return [
        new ConstructURLError('error building path, segment is not valid unicode', base, segment, { cause: errEscape }),
        null,
      ];
    }

    escaped.push(part);
  }

  const path = escaped.join('/');
  const [errUrl, url] = safeWrap(() => new URL(`${base}${path}`));
  if (errUrl) {
    return [new ConstructURLError('error building path, endpoint is not a valid URL', base, null, { cause: errUrl }), null];
  }

  return [null, url];
}
