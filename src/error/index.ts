/**
 * Error entrypoint: exports the failure taxonomy and helpers for identifying and unwrapping error types.
 * @module
 */

export { ConstructURLError, getConstructURLError, isConstructURLError } from './constructUrlError.js';
export { EmptyResponseError, getEmptyResponseError, isEmptyResponseError } from './emptyResponseError.js';
export { getHttpError, HTTPError, isHttpError } from './httpError.js';
export { isErrorType } from './isErrorType.js';
export {
  EncodingError,
  getEncodingError,
  getNotSerializableError,
  isEncodingError,
  isNotSerializableError,
  NotSerializableError,
} from './serializationError.js';
export { getTimeoutError, isTimeoutError, TimeoutError } from './timeoutError.js';
export { getTransportError, isTransportError, TransportError } from './transportError.js';
export { unwrapErrorType } from './unwrapErrorType.js';
export {
  classifyFailure,
  formatFailure,
  getUpdateError,
  isUpdateError,
  toUpdateError,
  UpdateError,
  type UpdateErrorKind,
  type UpdateFailure,
} from './updateError.js';
export { getValidationError, isValidationError, ValidationError } from './validationError.js';
