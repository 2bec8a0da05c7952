import { causeMessage } from '../utils/causeMessage.js';
import { getEmptyResponseError } from './emptyResponseError.js';
import { getHttpError } from './httpError.js';
import { isErrorType } from './isErrorType.js';
import { getEncodingError, getNotSerializableError } from './serializationError.js';
import { getTransportError } from './transportError.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Every way a submitted update can fail, with the details its message needs.
 */
export type UpdateFailure =
  | { kind: 'payload-not-serializable'; detail: string }
  | { kind: 'payload-encoding-error'; detail: string }
  | { kind: 'transport-io-error'; detail: string }
  | { kind: 'api-rejected-status'; status: number }
  | { kind: 'empty-response-body' }
  | { kind: 'generic-unexpected-error'; detail: string };

/** Discriminant of {@link UpdateFailure}. */
export type UpdateErrorKind = UpdateFailure['kind'];

/**
 * Failure arm of an update result. `message` is the human-readable text callers surface,
 * `kind` says which failure it was, and `cause` keeps the error that triggered it.
 */
export class UpdateError extends Error {
  /** UpdateError error-name */
  static name = 'UpdateError';
  /** Which failure this was */
  readonly kind: UpdateErrorKind;

  /** Creates a new instance of an UpdateError for the given failure kind */
  constructor(kind: UpdateErrorKind, message: string, opts?: ErrorOptions) {
    super(message, opts);
    this.kind = kind;
  }
}

/** Type guard for {@link UpdateError}. */
export function isUpdateError(error: unknown): error is UpdateError {
  return isErrorType(UpdateError, error);
}

/** Extract an {@link UpdateError} from an unknown error value, following nested causes. */
export function getUpdateError(error: unknown): UpdateError | null {
  return unwrapErrorType(UpdateError, error);
}

/**
 * Renders the message reported to callers for a failure.
 */
export function formatFailure(failure: UpdateFailure): string {
  switch (failure.kind) {
    case 'payload-not-serializable':
      return `Invalid JSON payload: ${failure.detail}`;
    case 'payload-encoding-error':
      return `Unable to create the request payload: ${failure.detail}`;
    case 'transport-io-error':
      return `Server exception when submitting update to Jira: ${failure.detail}`;
    case 'api-rejected-status':
      return `Error response code ${failure.status} when submitting update to Jira`;
    case 'empty-response-body':
      return 'Empty response body when submitting update to Jira';
    case 'generic-unexpected-error':
      return `Unexpected error when submitting update to Jira: ${failure.detail}`;
    default: {
      const unreachable: never = failure;
      return unreachable;
    }
  }
}

/** Message of whatever a wrapping error wraps, falling back to its own. */
function detailOf(error: Error): string {
  return error.cause === undefined ? error.message : causeMessage(error.cause);
}

/**
 * Classifies an arbitrary error into an {@link UpdateFailure}.
 * The first match in the cause chain wins, checked in order:
 * not-serializable, encoding, transport, rejected status, empty body, anything else.
 */
export function classifyFailure(error: unknown): UpdateFailure {
  const notSerializable = getNotSerializableError(error);
  if (notSerializable) {
    return { kind: 'payload-not-serializable', detail: detailOf(notSerializable) };
  }

  const encoding = getEncodingError(error);
  if (encoding) {
    return { kind: 'payload-encoding-error', detail: detailOf(encoding) };
  }

  const transport = getTransportError(error);
  if (transport) {
    return { kind: 'transport-io-error', detail: detailOf(transport) };
  }

  const httpError = getHttpError(error);
  if (httpError) {
    return { kind: 'api-rejected-status', status: httpError.status };
  }

  if (getEmptyResponseError(error)) {
    return { kind: 'empty-response-body' };
  }

  return { kind: 'generic-unexpected-error', detail: causeMessage(error) };
}

/**
 * Converts any error into the {@link UpdateError} handed back to callers.
 * An existing `UpdateError` is returned as-is.
 */
export function toUpdateError(error: unknown): UpdateError {
  if (error instanceof UpdateError) {
    return error;
  }

  const failure = classifyFailure(error);
  return new UpdateError(failure.kind, formatFailure(failure), { cause: error });
}
