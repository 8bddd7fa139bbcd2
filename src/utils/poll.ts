/**
 * Timer-driven waiting primitives
 * Every wait honors an AbortSignal and a deadline
 */

import { SessionError } from '../domain/errors/SessionError';

export interface PollOptions {
  intervalMs: number;
  timeoutMs: number;
  signal?: AbortSignal;
  now?: () => number;
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw SessionError.cancelled();
  }
}

/**
 * Resolves after ms, rejects with a CANCELLED SessionError on abort
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(SessionError.cancelled());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(SessionError.cancelled());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Calls probe until it yields a value or the deadline passes
 * @returns The first non-null value, or null on timeout
 */
export async function pollUntil<T>(
  probe: () => Promise<T | null | undefined> | T | null | undefined,
  options: PollOptions
): Promise<T | null> {
  const now = options.now ?? Date.now;
  const deadline = now() + options.timeoutMs;

  for (;;) {
    throwIfAborted(options.signal);

    const result = await probe();
    if (result !== null && result !== undefined) {
      return result;
    }

    const remaining = deadline - now();
    if (remaining <= 0) {
      return null;
    }

    await sleep(Math.min(options.intervalMs, remaining), options.signal);
  }
}
