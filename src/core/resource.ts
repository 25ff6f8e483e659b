/**
 * Monitored resource descriptor
 *
 * A typed descriptor (type tag + label set) identifying the entity that
 * telemetry should be attributed to. Instances are frozen once built.
 */

import { z } from 'zod';
import { AgentError, ErrorCode } from './errors.js';

export type MonitoredResource = {
  readonly type: string;
  readonly labels: Readonly<Record<string, string>>;
};

/**
 * Wire shape of a monitored resource
 */
export const MonitoredResourceSchema = z
  .object({
    type: z.string().min(1).describe('Resource type tag, e.g. gce_instance'),
    labels: z.record(z.string()).default({}).describe('Label name to label value')
  })
  .strict();

export type MonitoredResourceJSON = z.infer<typeof MonitoredResourceSchema>;

export function createMonitoredResource(
  type: string,
  labels: Record<string, string> = {}
): MonitoredResource {
  return Object.freeze({
    type,
    labels: Object.freeze({ ...labels })
  });
}

export function monitoredResourceToJSON(resource: MonitoredResource): MonitoredResourceJSON {
  return { type: resource.type, labels: { ...resource.labels } };
}

/**
 * Validate an unknown value (usually parsed JSON) as a monitored resource
 */
export function parseMonitoredResource(value: unknown): MonitoredResource {
  const result = MonitoredResourceSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new AgentError(ErrorCode.E_METADATA_INVALID, `Invalid monitored resource: ${issues}`);
  }
  return createMonitoredResource(result.data.type, result.data.labels);
}

/**
 * Stable key for comparing resources by value (label order does not matter)
 */
export function resourceKey(resource: MonitoredResource): string {
  const labels = Object.keys(resource.labels)
    .sort()
    .map((name) => [name, resource.labels[name]]);
  return JSON.stringify([resource.type, labels]);
}

export function formatMonitoredResource(resource: MonitoredResource): string {
  const labels = Object.entries(resource.labels)
    .map(([name, value]) => `${name}=${value}`)
    .join(',');
  return `${resource.type}{${labels}}`;
}
