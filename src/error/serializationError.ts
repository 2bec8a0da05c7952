import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a payload has no JSON representation at all
 * (circular structures, BigInt values, a bare `undefined`).
 * Points at a defect in the payload the caller assembled.
 */
export class NotSerializableError extends Error {
  /** NotSerializableError error-name */
  static name = 'NotSerializableError';
}

/**
 * Error raised when the codec fails while encoding an otherwise representable payload,
 * e.g. a `toJSON` implementation that throws.
 */
export class EncodingError extends Error {
  /** EncodingError error-name */
  static name = 'EncodingError';
}

/** Type guard for {@link NotSerializableError}. */
export function isNotSerializableError(error: unknown): error is NotSerializableError {
  return isErrorType(NotSerializableError, error);
}

/** Extract a {@link NotSerializableError} from an unknown error value, following nested causes. */
export function getNotSerializableError(error: unknown): NotSerializableError | null {
  return unwrapErrorType(NotSerializableError, error);
}

/** Type guard for {@link EncodingError}. */
export function isEncodingError(error: unknown): error is EncodingError {
  return isErrorType(EncodingError, error);
}

/** Extract an {@link EncodingError} from an unknown error value, following nested causes. */
export function getEncodingError(error: unknown): EncodingError | null {
  return unwrapErrorType(EncodingError, error);
}
