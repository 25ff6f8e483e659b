/**
 * Metadata store contract
 *
 * Every operation is synchronous, so each individual write becomes visible
 * to readers atomically. Implementations need no external locking.
 */

import type { Metadata } from '../core/metadata.js';
import type { MonitoredResource } from '../core/resource.js';

export type MetadataEntry = {
  resource: MonitoredResource;
  metadata: Metadata;
};

export interface MetadataStore {
  /**
   * Resolve an alias id to its resource.
   * @throws ResourceNotFoundError when the id was never registered
   */
  lookupResource(resourceId: string): MonitoredResource;

  /**
   * Register every id in `resourceIds` as an alias for `resource`
   */
  updateResource(resourceIds: readonly string[], resource: MonitoredResource): void;

  /**
   * Record metadata for a resource. The store takes ownership of `metadata`.
   */
  updateMetadata(resource: MonitoredResource, metadata: Metadata): void;

  lookupMetadata(resource: MonitoredResource): Metadata | undefined;

  getMetadataMap(): MetadataEntry[];
}
