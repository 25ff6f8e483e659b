import { describe, expect, it } from 'vitest';
import { createHealthChecker } from './health-checker.js';

describe('createHealthChecker', () => {
  it('is healthy until a component reports otherwise', () => {
    const checker = createHealthChecker();
    expect(checker.isHealthy()).toBe(true);

    checker.setUnhealthy('kubernetes');
    checker.setUnhealthy('docker');
    checker.setUnhealthy('docker');

    expect(checker.isHealthy()).toBe(false);
    expect(checker.unhealthyComponents()).toEqual(['docker', 'kubernetes']);
  });

  it('clears a component once it recovers', () => {
    const checker = createHealthChecker();
    checker.setUnhealthy('docker');
    checker.setHealthy('docker');
    checker.setHealthy('never-reported');

    expect(checker.isHealthy()).toBe(true);
    expect(checker.unhealthyComponents()).toEqual([]);
  });
});
