/**
 * Instance updater
 *
 * Publishes the host's own monitored resource. Everything it needs comes
 * from configuration, so the query never touches the network.
 */

import type { Logger } from 'pino';
import type { InstanceConfig } from '../config/schema.js';
import { createMetadata, ResourceMetadata } from '../core/metadata.js';
import { createMonitoredResource, type MonitoredResource } from '../core/resource.js';
import type { HealthChecker } from '../health/health-checker.js';
import { createSilentLogger } from '../logger.js';
import type { MetadataStore } from '../storage/metadata-store.js';
import { PollingMetadataUpdater } from './polling-updater.js';
import { MetadataUpdater, type UpdaterBackend, type UpdateSink } from './updater.js';

export const INSTANCE_UPDATER_NAME = 'instance';

// Empty id resolves to the host itself: GET /monitoredResource/
export const LOCAL_RESOURCE_ID = '';

export function instanceResource(config: InstanceConfig): MonitoredResource {
  const labels: Record<string, string> = { ...config.labels };
  if (config.instanceId) labels.instance_id = config.instanceId;
  if (config.zone) labels.zone = config.zone;
  return createMonitoredResource(config.resourceType, labels);
}

export function queryInstanceMetadata(config: InstanceConfig): ResourceMetadata[] {
  const resource = instanceResource(config);
  const ids = [LOCAL_RESOURCE_ID];
  if (config.instanceId) ids.push(config.instanceId);

  return [
    new ResourceMetadata(
      ids,
      resource,
      createMetadata({
        version: '1.0',
        payload: { type: resource.type, labels: { ...resource.labels } }
      })
    )
  ];
}

class InstanceUpdaterBackend implements UpdaterBackend {
  private readonly config: InstanceConfig;
  private readonly poller: PollingMetadataUpdater;

  constructor(config: InstanceConfig, logger: Logger) {
    this.config = config;
    this.poller = new PollingMetadataUpdater({
      name: INSTANCE_UPDATER_NAME,
      periodSeconds: config.updateIntervalSeconds,
      queryMetadata: () => queryInstanceMetadata(config),
      logger
    });
  }

  validateConfiguration(): boolean {
    if (!this.config.instanceId) {
      return false;
    }
    return this.poller.validateConfiguration();
  }

  startUpdater(sink: UpdateSink): void {
    this.poller.startUpdater(sink);
  }

  stopUpdater(): Promise<void> {
    return this.poller.stopUpdater();
  }
}

export function createInstanceUpdater(options: {
  config: InstanceConfig;
  store: MetadataStore;
  logger?: Logger;
  healthChecker?: HealthChecker;
}): MetadataUpdater {
  const logger = options.logger ?? createSilentLogger();
  return new MetadataUpdater({
    name: INSTANCE_UPDATER_NAME,
    store: options.store,
    backend: new InstanceUpdaterBackend(options.config, logger),
    logger,
    healthChecker: options.healthChecker
  });
}
