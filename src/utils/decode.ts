import type { StandardSchemaV1 } from '@standard-schema/spec';
import { DecodeError } from '../error/decodeError.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap, safeWrapAsync } from './wrap.js';

/** Any Standard Schema validator (zod, valibot, arktype, ...) producing `Output`. */
export type SchemaType<Output = unknown> = StandardSchemaV1<unknown, Output>;

/**
 * Validates an already parsed value against a Standard Schema.
 *
 * The schema may validate synchronously or return a promise; a throwing
 * schema is reported like a failed validation. `body` is only carried into
 * the {@link DecodeError} for diagnosis.
 */
export async function validator<Output>(
  input: unknown,
  schema: SchemaType<Output>,
  body: string,
): SafeWrapAsync<DecodeError, Output> {
  const [errStart, pending] = safeWrap(() => schema['~standard'].validate(input));
  if (errStart) {
    return [new DecodeError('error validating on validation start', body, [], { cause: errStart }), null];
  }

  const [errAsync, result] = await safeWrapAsync(() => Promise.resolve(pending));
  if (errAsync) {
    return [new DecodeError('error validating async data', body, [], { cause: errAsync }), null];
  }

  if (result.issues) {
    return [new DecodeError('error validating data', body, result.issues), null];
  }

  return [null, result.value];
}

/**
 * `JSON.parse` returning a {@link DecodeError} instead of throwing.
 *
 * An empty body stands for JSON `null`, so schemas of bodiless responses
 * decide for themselves whether that is acceptable.
 */
export function parseJson(body: string): SafeWrap<DecodeError, unknown> {
  if (body.trim() === '') {
    return [null, null];
  }

  const [errJson, json] = safeWrap((): unknown => JSON.parse(body));
  if (errJson) {
    return [new DecodeError('error parsing json response body', body, [], { cause: errJson }), null];
  }

  return [null, json];
}

/**
 * Parses a response body as JSON and validates it.
 */
export async function decode<Output>(body: string, schema: SchemaType<Output>): SafeWrapAsync<DecodeError, Output> {
  const [errJson, json] = parseJson(body);
  if (errJson) {
    return [errJson, null];
  }

  return validator(json, schema, body);
}
