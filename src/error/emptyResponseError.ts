import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a successful response carries no body to decode.
 */
export class EmptyResponseError extends Error {
  /** EmptyResponseError error-name */
  static name = 'EmptyResponseError';
}

/** Type guard for {@link EmptyResponseError}. */
export function isEmptyResponseError(error: unknown): error is EmptyResponseError {
  return isErrorType(EmptyResponseError, error);
}

/** Extract an {@link EmptyResponseError} from an unknown error value, following nested causes. */
export function getEmptyResponseError(error: unknown): EmptyResponseError | null {
  return unwrapErrorType(EmptyResponseError, error);
}
