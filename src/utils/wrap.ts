/**
 * Tuple-based result used throughout the client, `[error, data]`.
 */
export type SafeWrap<ErrorType extends Error = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType extends Error = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/** Normalizes a thrown value, since `throw` accepts anything. */
function toError(thrown: unknown): Error {
  if (thrown instanceof Error) {
    return thrown;
  }

  return new Error(typeof thrown === 'string' ? thrown : 'non-error value thrown', { cause: thrown });
}

/**
 * Gracefully handles a given Promise factory.
 * @example
 * const [error, response] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<DataType>(promise: () => Promise<DataType>): SafeWrapAsync<Error, DataType> {
  try {
    const data = await promise();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}

/**
 * Wrap a synchronous function in a tuple-style result.
 */
export function safeWrap<DataType>(fn: () => DataType): SafeWrap<Error, DataType> {
  try {
    const data = fn();
    return [null, data];
  } catch (error) {
    return [toError(error), null];
  }
}
