/**
 * Timer helpers that honour AbortSignals so no timer outlives its caller
 */

/**
 * Resolve after `ms` milliseconds, or reject with the signal's reason once it aborts.
 * The timer is cleared on abort.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(abortReason(signal));
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function abortReason(signal: AbortSignal | undefined): unknown {
  return signal?.reason ?? new Error('Operation aborted');
}

/**
 * Delay before retry `attempt` (1-based) under exponential backoff
 */
export function backoffDelay(attempt: number, baseDelay: number, factor: number, maxDelay: number): number {
  return Math.min(baseDelay * factor ** (attempt - 1), maxDelay);
}

/**
 * Combine several optional signals into one that aborts when any of them does
 */
export function anySignal(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (present.length <= 1) {
    return present[0];
  }
  return AbortSignal.any(present);
}

export interface Deadline {
  signal: AbortSignal;
  /** Stop the timer once the bounded operation has settled */
  clear(): void;
}

/**
 * A signal that aborts with `reason` after `ms` milliseconds.
 * Runs on `setTimeout`, so fake timers control it.
 */
export function deadline(ms: number, reason: () => unknown): Deadline {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(reason()), Math.max(0, ms));
  return { signal: controller.signal, clear: () => clearTimeout(timer) };
}

/**
 * Settle with `promise`, or reject with the signal's reason as soon as it aborts.
 * The underlying operation is not cancelled; its outcome is ignored.
 */
export function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise((resolve, reject) => {
    const onAbort = (): void => reject(abortReason(signal));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    // settling after an abort is a no-op, but the outcome is still observed
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}
