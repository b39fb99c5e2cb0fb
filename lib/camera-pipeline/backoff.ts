/**
 * Abortable waits and capped exponential backoff.
 */

export const ABORTED = Symbol("aborted");

/** initial * 2^(attempt-1), capped. attempt starts at 1. */
export function backoffDelay(attempt: number, initialMs: number, maxMs: number): number {
  const n = Math.max(1, attempt);
  return Math.min(initialMs * Math.pow(2, n - 1), maxMs);
}

/** Resolves true after `ms`, or false as soon as the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Settles with the promise, or with ABORTED when the signal fires first.
 * A rejection arriving after the abort is reported to `onLateError`.
 */
export function untilAborted<T>(
  promise: Promise<T>,
  signal: AbortSignal,
  onLateError: (e: unknown) => void
): Promise<T | typeof ABORTED> {
  if (signal.aborted) {
    promise.catch(onLateError);
    return Promise.resolve(ABORTED);
  }
  return new Promise((resolve, reject) => {
    let settled = false;
    const onAbort = () => {
      if (settled) return;
      settled = true;
      resolve(ABORTED);
    };
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        if (settled) return;
        settled = true;
        resolve(value);
      },
      (e: unknown) => {
        signal.removeEventListener("abort", onAbort);
        if (settled) {
          onLateError(e);
          return;
        }
        settled = true;
        reject(e);
      }
    );
  });
}

/**
 * Rejects with `onTimeout()` if the promise has not settled within `ms`.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  onTimeout: () => Error,
  onLateError: (e: unknown) => void
): Promise<T> {
  if (ms <= 0) return promise;
  return new Promise((resolve, reject) => {
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      reject(onTimeout());
    }, ms);
    promise.then(
      (value) => {
        clearTimeout(timer);
        if (!timedOut) resolve(value);
      },
      (e: unknown) => {
        clearTimeout(timer);
        if (timedOut) onLateError(e);
        else reject(e);
      }
    );
  });
}
