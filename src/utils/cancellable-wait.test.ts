import { describe, expect, it } from 'vitest';
import { waitUnlessAborted } from './cancellable-wait.js';

describe('waitUnlessAborted', () => {
  it('resolves true when the period elapses', async () => {
    await expect(waitUnlessAborted(5, new AbortController().signal)).resolves.toBe(true);
  });

  it('resolves false right away for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(waitUnlessAborted(60_000, controller.signal)).resolves.toBe(false);
  });

  it('resolves false when aborted mid-wait', async () => {
    const controller = new AbortController();
    const startedAt = performance.now();
    const waiting = waitUnlessAborted(60_000, controller.signal);

    setTimeout(() => controller.abort(), 10);

    await expect(waiting).resolves.toBe(false);
    expect(performance.now() - startedAt).toBeLessThan(1000);
  });

  it('does not fire early for delays beyond the timer range', async () => {
    const controller = new AbortController();
    let settled = false;
    const waiting = waitUnlessAborted(Number.MAX_SAFE_INTEGER, controller.signal).then((value) => {
      settled = true;
      return value;
    });

    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(settled).toBe(false);

    controller.abort();
    await expect(waiting).resolves.toBe(false);
  });
});
