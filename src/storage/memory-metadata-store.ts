/**
 * Memory-based metadata store implementation
 */

import type { Logger } from 'pino';
import { ResourceNotFoundError } from '../core/errors.js';
import type { Metadata } from '../core/metadata.js';
import { formatMonitoredResource, type MonitoredResource, resourceKey } from '../core/resource.js';
import type { MetadataEntry, MetadataStore } from './metadata-store.js';

export type MemoryMetadataStore = MetadataStore & {
  /**
   * Drop metadata flagged as deleted; returns how many entries went away
   */
  purgeDeletedEntries(): number;
  resourceCount(): number;
  clear(): void;
};

export function createMemoryMetadataStore(options: { logger?: Logger } = {}): MemoryMetadataStore {
  const logger = options.logger;
  const resources: Map<string, MonitoredResource> = new Map();
  // keyed by resourceKey()
  const metadataMap: Map<string, MetadataEntry> = new Map();

  return {
    lookupResource(resourceId: string): MonitoredResource {
      const resource = resources.get(resourceId);
      if (!resource) {
        throw new ResourceNotFoundError(resourceId);
      }
      return resource;
    },

    updateResource(resourceIds: readonly string[], resource: MonitoredResource): void {
      for (const id of resourceIds) {
        logger?.debug({ id, resource: formatMonitoredResource(resource) }, 'Updating resource map');
        resources.set(id, resource);
      }
    },

    updateMetadata(resource: MonitoredResource, metadata: Metadata): void {
      if (metadata.ignore) {
        return;
      }

      const key = resourceKey(resource);
      const existing = metadataMap.get(key);
      if (existing && existing.metadata.collectedAt.getTime() > metadata.collectedAt.getTime()) {
        logger?.debug(
          { resource: formatMonitoredResource(resource), version: metadata.version },
          'Discarding stale metadata'
        );
        return;
      }

      metadataMap.set(key, { resource, metadata });
    },

    lookupMetadata(resource: MonitoredResource): Metadata | undefined {
      return metadataMap.get(resourceKey(resource))?.metadata;
    },

    getMetadataMap(): MetadataEntry[] {
      return Array.from(metadataMap.values(), (entry) => ({ ...entry }));
    },

    purgeDeletedEntries(): number {
      let purged = 0;
      for (const [key, entry] of metadataMap) {
        if (entry.metadata.isDeleted) {
          metadataMap.delete(key);
          purged++;
        }
      }
      if (purged > 0) {
        logger?.debug({ purged }, 'Purged deleted metadata entries');
      }
      return purged;
    },

    resourceCount(): number {
      return resources.size;
    },

    clear(): void {
      resources.clear();
      metadataMap.clear();
    }
  };
}
