export interface Deadline {
  readonly signal: AbortSignal;
  readonly timeoutMs: number;
  readonly expired: boolean;
  clear: () => void;
}

function createTimeoutReason(timeoutMs: number): Error {
  const error = new Error(`Deadline of ${timeoutMs}ms elapsed`);
  error.name = 'TimeoutError';
  return error;
}

/**
 * One timer for a whole request: every hop and the body read share its
 * signal. Firing aborts whatever is in flight; `clear` releases the timer.
 */
export function createDeadline(timeoutMs: number): Deadline {
  const controller = new AbortController();
  let expired = false;

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(createTimeoutReason(timeoutMs));
  }, timeoutMs);
  timer.unref();

  return {
    signal: controller.signal,
    timeoutMs,
    get expired() {
      return expired;
    },
    clear: () => {
      clearTimeout(timer);
    },
  };
}
