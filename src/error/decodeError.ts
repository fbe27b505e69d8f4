import type { StandardSchemaV1 } from '@standard-schema/spec';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error representing a success response whose body is not JSON, or does not
 * match the schema of the call.
 */
export class DecodeError extends Error {
  /** DecodeError error-name */
  readonly name = 'DecodeError';
  /** Raw response body */
  body: string;
  /** Schema validation issues, empty when the body was not JSON at all */
  issues: StandardSchemaV1.Issue[];

  /** Creates a new instance of the DecodeError, with the raw body and accompanying issues */
  constructor(message: string, body: string, issues: readonly StandardSchemaV1.Issue[], opts?: ErrorOptions) {
    super(issues.length > 0 ? `${message}; issues: ${JSON.stringify(issues)}` : message, opts);

    this.body = body;
    this.issues = [...issues];
  }
}

/**
 * Type guard for {@link DecodeError}.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return isErrorType(DecodeError, error);
}

/**
 * Extract a {@link DecodeError} from an unknown error value, following nested causes.
 */
export function getDecodeError(error: unknown): null | DecodeError {
  return unwrapErrorType(DecodeError, error);
}
