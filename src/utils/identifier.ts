import { InvalidIdentifierError } from '../error/invalidIdentifierError.js';
import type { SafeWrap } from './wrap.js';

/** Base-62 IDs and slugs: alphanumerics plus `_`, `-` and `.`. */
const IDENTIFIER_PATTERN = /^[A-Za-z0-9_.-]{1,64}$/;

/** Hex digest lengths per supported file hash algorithm. */
const HASH_LENGTHS = {
  sha1: 40,
  sha512: 128,
} as const;

/** File hash algorithms accepted by the version-file routes. */
export type HashAlgorithm = keyof typeof HASH_LENGTHS;

/**
 * Checks that an ID or slug can be embedded as a single path segment.
 *
 * `.` and `..` match the character set but would be collapsed by URL
 * resolution, so they are refused too.
 */
export function validateIdentifier(id: string): SafeWrap<InvalidIdentifierError, string> {
  if (!IDENTIFIER_PATTERN.test(id) || id === '.' || id === '..') {
    return [new InvalidIdentifierError(id), null];
  }

  return [null, id];
}

/**
 * Validates every identifier in order, returning the first failure.
 */
export function validateIdentifiers(ids: readonly string[]): SafeWrap<InvalidIdentifierError, string[]> {
  for (const id of ids) {
    const [err] = validateIdentifier(id);
    if (err) {
      return [err, null];
    }
  }

  return [null, [...ids]];
}

/**
 * Checks a hex file digest against the length of its algorithm.
 */
export function validateHash(hash: string, algorithm: HashAlgorithm): SafeWrap<InvalidIdentifierError, string> {
  const length = HASH_LENGTHS[algorithm];
  if (hash.length !== length || !/^[0-9a-fA-F]+$/.test(hash)) {
    return [new InvalidIdentifierError(hash, `invalid ${algorithm} hash ${JSON.stringify(hash)}`), null];
  }

  return [null, hash];
}
