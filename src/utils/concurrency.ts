/**
 * Functional concurrency utilities
 * Counting semaphore used to bound concurrent request dispatch
 */

export interface Semaphore {
  acquire(): Promise<void>;
  release(): void;
  withPermit<T>(fn: () => Promise<T>): Promise<T>;
  available(): number;
  inUse(): number;
  waiting(): number;
  /**
   * Resolves once every permit has been returned
   */
  drained(): Promise<void>;
}

/**
 * Create a semaphore with the given number of permits
 */
export function createSemaphore(permits: number): Semaphore {
  if (!Number.isInteger(permits) || permits < 1) {
    throw new RangeError(`Semaphore needs at least one permit, got ${permits}`);
  }

  let available = permits;
  const waiters: Array<() => void> = [];
  let drainWaiters: Array<() => void> = [];

  const notifyDrained = (): void => {
    if (available !== permits || drainWaiters.length === 0) return;
    const pending = drainWaiters;
    drainWaiters = [];
    for (const resolve of pending) resolve();
  };

  const semaphore: Semaphore = {
    acquire(): Promise<void> {
      return new Promise<void>((resolve) => {
        if (available > 0) {
          available--;
          resolve();
        } else {
          waiters.push(resolve);
        }
      });
    },

    release(): void {
      const next = waiters.shift();
      if (next) {
        // Permit passes straight to the next waiter
        next();
        return;
      }
      available = Math.min(available + 1, permits);
      notifyDrained();
    },

    async withPermit<T>(fn: () => Promise<T>): Promise<T> {
      await semaphore.acquire();
      try {
        return await fn();
      } finally {
        semaphore.release();
      }
    },

    available(): number {
      return available;
    },

    inUse(): number {
      return permits - available;
    },

    waiting(): number {
      return waiters.length;
    },

    drained(): Promise<void> {
      if (available === permits) return Promise.resolve();
      return new Promise<void>((resolve) => {
        drainWaiters.push(resolve);
      });
    }
  };

  return semaphore;
}
