import { ShutdownError } from '../domain/index.js';

export interface BackoffPolicy {
  readonly baseSeconds: number;
  readonly maxSeconds: number;
}

/**
 * Exponential backoff, capped: `min(base * 2^(attempt-1), max)`.
 * `attempt` is 1 for the delay after the first failure.
 */
export function backoffDelayMs(attempt: number, policy: BackoffPolicy): number {
  const exponential = policy.baseSeconds * 2 ** Math.max(0, attempt - 1);
  return Math.round(Math.min(exponential, policy.maxSeconds) * 1000);
}

/** Waits `ms`, rejecting with ShutdownError as soon as `signal` aborts. */
export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.reject(new ShutdownError());
  return new Promise((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new ShutdownError());
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/** Like `sleep`, but resolves early instead of rejecting on abort. */
export async function pause(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await sleep(ms, signal);
  } catch (err: unknown) {
    if (!(err instanceof ShutdownError)) throw err;
  }
}
