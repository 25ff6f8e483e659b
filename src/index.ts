/**
 * metadatad - local metadata agent
 *
 * Maps short-lived resource ids to monitored resources, keeps the mapping
 * fresh through updaters and serves lookups over a local HTTP API.
 */

export { createAgent, MetadataAgent } from './agent.js';
export {
  Dispatcher,
  type DispatchRequest,
  type MatchPolicy,
  ResponseWriter,
  type Route,
  type RouteHandler,
  writeJsonError
} from './api/dispatcher.js';
export {
  createHealthzHandler,
  createMonitoredResourceHandler,
  HEALTHZ_PATH,
  MONITORED_RESOURCE_PREFIX
} from './api/handlers.js';
export { buildRoutes, createMetadataApiServer, MetadataApiServer } from './api/server.js';
export { applyOverrides, type ConfigOverrides, loadConfig } from './config/loader.js';
export {
  type AgentConfig,
  AgentConfigSchema,
  defaultConfig,
  type InstanceConfig,
  type MetadataApiConfig
} from './config/schema.js';
export {
  AgentError,
  ErrorCode,
  type ErrorCodeType,
  isResourceNotFound,
  ResourceNotFoundError,
  toAgentError
} from './core/errors.js';
export {
  createIgnoredMetadata,
  createMetadata,
  type Metadata,
  ResourceMetadata
} from './core/metadata.js';
export {
  createMonitoredResource,
  type MonitoredResource,
  monitoredResourceToJSON,
  parseMonitoredResource
} from './core/resource.js';
export { createHealthChecker, type HealthChecker } from './health/health-checker.js';
export { createLogger, type Logger, type LogLevel } from './logger.js';
export { createMemoryMetadataStore, type MemoryMetadataStore } from './storage/memory-metadata-store.js';
export type { MetadataEntry, MetadataStore } from './storage/metadata-store.js';
export { createInstanceUpdater } from './updaters/instance-updater.js';
export {
  createPollingUpdater,
  PollingMetadataUpdater,
  type QueryMetadata
} from './updaters/polling-updater.js';
export {
  MetadataUpdater,
  type UpdaterBackend,
  UpdaterState,
  type UpdateSink
} from './updaters/updater.js';
