import { performance } from 'node:perf_hooks';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export type MonotonicClock = () => number;

export const monotonicNow: MonotonicClock = () => performance.now();

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const sleep: Sleep = (ms, signal) =>
  new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * `withTimeout` for a promise that yields a resource. When the timeout wins,
 * a value that still arrives later is handed to `release`.
 */
export async function withTimeoutReleasing<T>(
  promise: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
  release: (late: T) => void,
): Promise<T> {
  let expired = false;
  try {
    return await withTimeout(promise, timeoutMs, () => {
      expired = true;
      return onTimeout();
    });
  } catch (err) {
    if (expired) {
      void promise.then(release, () => undefined);
    }
    throw err;
  }
}
