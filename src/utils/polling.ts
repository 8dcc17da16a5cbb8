/**
 * Abortable waiting helpers
 */

import { setTimeout as sleep } from 'node:timers/promises';

export interface PollOptions {
  timeoutMs: number;
  intervalMs: number;
  signal?: AbortSignal;
}

/**
 * Sleep that rejects with the signal's reason as soon as it aborts
 */
export async function delay(ms: number, signal?: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal });
}

/**
 * Re-check a condition until it returns a value or the timeout expires.
 * Errors thrown by the check count as "not yet" unless the signal aborted.
 */
export async function pollFor<T>(
  check: () => Promise<T | null | undefined>,
  options: PollOptions
): Promise<T | undefined> {
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    options.signal?.throwIfAborted();
    try {
      const value = await check();
      if (value !== null && value !== undefined) {
        return value;
      }
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      return undefined;
    }
    await delay(Math.min(options.intervalMs, remaining), options.signal);
  }
}

/**
 * Boolean form of {@link pollFor}
 */
export async function pollUntil(check: () => Promise<boolean>, options: PollOptions): Promise<boolean> {
  const result = await pollFor(async () => ((await check()) ? true : undefined), options);
  return result === true;
}
