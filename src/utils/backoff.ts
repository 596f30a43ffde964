/**
 * msgate — Exponential Backoff
 *
 * Half-floor jitter: attempt i waits between backoff/2 and backoff,
 * where backoff = base * 2^i.
 */

/** Uniform random source in [0, 1). */
export type RandomSource = () => number;

/** The un-jittered delay for a 0-indexed attempt. */
export function exponentialBackoff(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** attempt;
}

/** Minimum delay for an attempt: half the exponential backoff. */
export function backoffFloor(baseDelayMs: number, attempt: number): number {
  return Math.floor(exponentialBackoff(baseDelayMs, attempt) / 2);
}

/**
 * Compute the delay before retrying after attempt `attempt` (0-indexed).
 *
 * Returns `backoff/2 + random(0, backoff/2)`, so the wait never drops
 * below half the exponential value and never exceeds it.
 */
export function computeBackoff(
  baseDelayMs: number,
  attempt: number,
  random: RandomSource = Math.random
): number {
  const floor = backoffFloor(baseDelayMs, attempt);
  return floor + Math.floor(random() * floor);
}

/**
 * Sleep for the specified duration in milliseconds.
 * Optionally accepts an AbortSignal for cancellation; rejects with the
 * signal's reason when aborted.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
