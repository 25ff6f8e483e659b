/**
 * Configuration schemas for metadatad
 * Using Zod for runtime validation and type inference
 */

import { z } from 'zod';
import { LOG_LEVELS } from '../logger.js';

export const DEFAULT_API_HOST = '0.0.0.0';
export const DEFAULT_API_PORT = 8000;
export const DEFAULT_API_THREADS = 3;
export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000;
export const DEFAULT_INSTANCE_INTERVAL_SECONDS = 60;
export const DEFAULT_PURGE_INTERVAL_SECONDS = 60;

/**
 * Local metadata API server
 */
export const MetadataApiConfigSchema = z
  .object({
    host: z.string().min(1).default(DEFAULT_API_HOST).describe('Address to bind'),
    port: z.number().int().min(0).max(65535).default(DEFAULT_API_PORT).describe('Port to bind'),
    numThreads: z
      .number()
      .int()
      .min(1)
      .default(DEFAULT_API_THREADS)
      .describe('Requests dispatched concurrently'),
    shutdownTimeoutMs: z
      .number()
      .int()
      .min(0)
      .default(DEFAULT_SHUTDOWN_TIMEOUT_MS)
      .describe('How long stop() waits for in-flight requests before closing sockets')
  })
  .strict();

/**
 * Host instance resource published by the instance updater
 */
export const InstanceConfigSchema = z
  .object({
    enabled: z.boolean().optional().describe('Defaults to whether instanceId is set'),
    resourceType: z.string().min(1).default('gce_instance'),
    instanceId: z.string().optional().describe('Id of this host; required when enabled'),
    zone: z.string().optional(),
    labels: z.record(z.string()).default({}).describe('Extra resource labels'),
    updateIntervalSeconds: z
      .number()
      .default(DEFAULT_INSTANCE_INTERVAL_SECONDS)
      .describe('Seconds between refreshes; 0 publishes nothing')
  })
  .strict()
  .transform((config) => ({
    ...config,
    enabled: config.enabled ?? config.instanceId !== undefined
  }));

/**
 * In-memory metadata store
 */
export const StoreConfigSchema = z
  .object({
    purgeIntervalSeconds: z
      .number()
      .min(0)
      .default(DEFAULT_PURGE_INTERVAL_SECONDS)
      .describe('Seconds between purges of deleted metadata; 0 disables purging')
  })
  .strict();

export const AgentConfigSchema = z
  .object({
    $schema: z.string().optional(),
    verboseLogging: z.boolean().default(false).describe('Log every request and lookup'),
    logLevel: z.enum(LOG_LEVELS).default('info'),
    metadataApi: MetadataApiConfigSchema.default({}),
    instance: InstanceConfigSchema.default({}),
    store: StoreConfigSchema.default({})
  })
  .strict();

export type AgentConfig = z.infer<typeof AgentConfigSchema>;
export type MetadataApiConfig = z.infer<typeof MetadataApiConfigSchema>;
export type InstanceConfig = z.infer<typeof InstanceConfigSchema>;
export type StoreConfig = z.infer<typeof StoreConfigSchema>;
export type AgentConfigInput = z.input<typeof AgentConfigSchema>;

export function safeParseConfig(value: unknown) {
  return AgentConfigSchema.safeParse(value);
}

/**
 * Render validation issues one per line
 */
export function formatConfigError(error: z.ZodError): string {
  const lines = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `  - ${path}: ${issue.message}`;
  });
  return `Invalid configuration:\n${lines.join('\n')}`;
}

export function defaultConfig(): AgentConfig {
  return AgentConfigSchema.parse({});
}
