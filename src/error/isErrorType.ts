import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Generic type guard to check if an unknown error, or anything in its `cause` chain, matches an error class.
 */
export function isErrorType<T extends Error>(errorClass: new (...args: never[]) => T, err: unknown): err is T {
  return unwrapErrorType(errorClass, err) !== null;
}
