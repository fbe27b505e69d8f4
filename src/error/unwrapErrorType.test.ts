import { describe, expect, it } from 'vitest';
import { DecodeError } from './decodeError.js';
import { InvalidIdentifierError } from './invalidIdentifierError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

class CustomError extends Error {}

describe('unwrapErrorType', () => {
  it('non-error correctly returns null', () => {
    expect(unwrapErrorType(CustomError, { foo: 'bar' })).toBeNull();
    expect(unwrapErrorType(CustomError, 'boom')).toBeNull();
  });

  it('unwraps the error itself', () => {
    const err = new InvalidIdentifierError('a b');

    expect(unwrapErrorType(InvalidIdentifierError, err)).toBe(err);
  });

  it('unwraps through 5 layers', () => {
    const err = new DecodeError('error decoding body', '{', []);
    let wrapped: Error = err;
    for (let i = 0; i < 5; i++) {
      wrapped = new Error(`err${i}`, { cause: wrapped });
    }

    const unwrapped = unwrapErrorType(DecodeError, wrapped);

    expect(unwrapped).toBe(err);
    expect(unwrapped?.body).toBe('{');
  });

  it('returns the outermost match', () => {
    const inner = new CustomError('inner');
    const outer = new CustomError('outer', { cause: inner });

    expect(unwrapErrorType(CustomError, outer)).toBe(outer);
  });

  it('stops at a non-error cause', () => {
    const wrapped = new Error('outer', { cause: { message: 'not an error' } });

    expect(unwrapErrorType(CustomError, wrapped)).toBeNull();
  });
});
