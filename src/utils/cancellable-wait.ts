/**
 * Interruptible sleep for periodic loops
 */

import { setTimeout as delay } from 'node:timers/promises';

// Largest delay a Node timer accepts; longer ones fire after 1ms
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

/**
 * Wait `ms` milliseconds unless `signal` aborts first.
 * Resolves `true` when the full period elapsed, `false` when cancelled.
 */
export async function waitUnlessAborted(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;

  try {
    await delay(Math.min(Math.max(ms, 0), MAX_TIMER_DELAY_MS), undefined, { signal });
    return true;
  } catch (error) {
    if (signal.aborted) return false;
    throw error;
  }
}
