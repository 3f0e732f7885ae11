/**
 * Timeout Guard
 * Abortable sleeps for background loops and bounded waits
 */

import { setTimeout as delay } from 'node:timers/promises';

/**
 * Millisecond wall clock. Injected so tests can move time by hand.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Sleep for ms, or until signal aborts.
 * Resolves true when the full delay elapsed, false when aborted.
 * The timer never keeps the process alive on its own.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) return false;
  try {
    await delay(ms, undefined, { signal, ref: false });
    return true;
  } catch (error) {
    if (isAbortError(error)) return false;
    throw error;
  }
}
