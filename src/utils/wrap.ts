/**
 * Error-first tuple, `[error, data]`. Exactly one side is set.
 */
export type SafeWrap<ErrorType = Error, DataType = unknown> =
  | [error: ErrorType, data: null]
  | [error: null, data: DataType];

/**
 * Async variant of {@link SafeWrap}.
 */
export type SafeWrapAsync<ErrorType = Error, DataType = unknown> = Promise<SafeWrap<ErrorType, DataType>>;

/**
 * Runs a promise factory and settles it into a tuple instead of rejecting.
 * A synchronous throw from the factory lands in the error slot as well.
 * @example
 * const [error, response] = await safeWrapAsync(() => fetch(url));
 */
export async function safeWrapAsync<ErrorType = Error, DataType = unknown>(
  promise: () => Promise<DataType>,
): SafeWrapAsync<ErrorType, DataType> {
  try {
    return [null, await promise()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}

/**
 * Runs a synchronous function and settles it into a tuple instead of throwing.
 * @example
 * const [error, text] = safeWrap(() => JSON.stringify(payload));
 */
export function safeWrap<ErrorType = Error, DataType = unknown>(fn: () => DataType): SafeWrap<ErrorType, DataType> {
  try {
    return [null, fn()];
  } catch (error) {
    return [error as ErrorType, null];
  }
}
