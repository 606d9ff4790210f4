// ── Cancellation Errors ─────────────────────────────────────────────────────

export class TimeoutError extends Error {
  override readonly name = "TimeoutError";

  constructor(readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
  }
}

export class OperationCancelledError extends Error {
  override readonly name = "OperationCancelledError";

  constructor(readonly reason: string = "cancelled") {
    super(`Operation cancelled: ${reason}`);
  }
}

/**
 * The error an aborted signal carries, or a generic cancellation when the
 * abort reason is not an Error.
 */
export function abortReason(signal: AbortSignal): Error {
  return signal.reason instanceof Error
    ? signal.reason
    : new OperationCancelledError(String(signal.reason ?? "aborted"));
}

// ── Sleep ───────────────────────────────────────────────────────────────────

/**
 * Sleep for the given duration, but reject immediately if the abort signal fires.
 */
export function cancellableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal ? abortReason(signal) : new OperationCancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ── Timeout Race ────────────────────────────────────────────────────────────

/** Longest delay a Node timer holds. Larger delays fire after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface TimeoutOptions {
  /** Parent signal. Aborting it cancels the operation with the parent's reason. */
  readonly signal?: AbortSignal;
}

/**
 * Race `operation` against a deadline.
 *
 * The operation receives a child signal that is aborted when the deadline
 * passes or the parent signal fires, so the losing side is actively
 * cancelled. When the operation settles first the deadline timer is cleared.
 *
 * Rejects with `TimeoutError` on deadline, with the parent's abort reason on
 * parent cancellation, otherwise settles like the operation.
 */
export function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  options: TimeoutOptions = {},
): Promise<T> {
  const parent = options.signal;
  if (parent?.aborted) {
    return Promise.reject(abortReason(parent));
  }

  const child = new AbortController();

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const finish = (settle: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
      settle();
    };

    const onParentAbort = () => {
      const reason = parent ? abortReason(parent) : new OperationCancelledError();
      child.abort(reason);
      finish(() => reject(reason));
    };

    // Deadlines past the timer range are reached in several hops.
    const arm = (remainingMs: number) => {
      timer = setTimeout(
        () => {
          if (remainingMs > MAX_TIMER_DELAY_MS) {
            arm(remainingMs - MAX_TIMER_DELAY_MS);
            return;
          }
          const timeout = new TimeoutError(timeoutMs);
          child.abort(timeout);
          finish(() => reject(timeout));
        },
        Math.min(Math.max(0, remainingMs), MAX_TIMER_DELAY_MS),
      );
    };
    arm(timeoutMs);

    parent?.addEventListener("abort", onParentAbort, { once: true });

    let pending: Promise<T>;
    try {
      pending = operation(child.signal);
    } catch (err: unknown) {
      finish(() => reject(err));
      return;
    }

    pending.then(
      (value) => finish(() => resolve(value)),
      (err: unknown) => finish(() => reject(err)),
    );
  });
}
