import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when the request could not be sent or its response could not be read
 * (DNS, refused connections, resets, timeouts).
 */
export class TransportError extends Error {
  /** TransportError error-name */
  static name = 'TransportError';
}

/**
 * Type guard for {@link TransportError}.
 */
export function isTransportError(error: unknown): error is TransportError {
  return isErrorType(TransportError, error);
}

/**
 * Extract a {@link TransportError} from an unknown error value, following nested causes.
 */
export function getTransportError(error: unknown): TransportError | null {
  return unwrapErrorType(TransportError, error);
}
