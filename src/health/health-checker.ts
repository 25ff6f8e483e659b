/**
 * Component health tracking for the /healthz endpoint
 */

export type HealthChecker = {
  setUnhealthy(component: string): void;
  setHealthy(component: string): void;
  isHealthy(): boolean;
  unhealthyComponents(): string[];
};

export function createHealthChecker(): HealthChecker {
  const unhealthy = new Set<string>();

  return {
    setUnhealthy(component: string): void {
      unhealthy.add(component);
    },

    setHealthy(component: string): void {
      unhealthy.delete(component);
    },

    isHealthy(): boolean {
      return unhealthy.size === 0;
    },

    unhealthyComponents(): string[] {
      return Array.from(unhealthy).sort();
    }
  };
}
