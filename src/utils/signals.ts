import { TimeoutError } from '../error/timeoutError.js';

/**
 * Creates an {@link AbortSignal} that aborts with a {@link TimeoutError} after `timeoutMs`.
 *
 * When `timeoutMs` is `false` or `0`, no signal is created. The timer does not keep the
 * process alive and is cleared as soon as the signal aborts.
 */
export function createTimeoutSignal(timeoutMs?: number | false): AbortSignal | null {
  if (!timeoutMs) {
    return null;
  }

  const controller = new AbortController();

  const timeout = setTimeout(
    () => controller.abort(new TimeoutError(`error request timed out after ${timeoutMs}ms`)),
    timeoutMs,
  );
  timeout.unref?.();

  controller.signal.addEventListener('abort', () => clearTimeout(timeout), {
    once: true,
  });

  return controller.signal;
}
