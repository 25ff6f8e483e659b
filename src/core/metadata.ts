/**
 * Resource metadata values produced by updaters and consumed by the store
 */

import { AgentError, ErrorCode } from './errors.js';
import type { MonitoredResource } from './resource.js';

/**
 * Opaque, updater-defined payload plus its freshness information
 */
export type Metadata = {
  readonly version: string;
  readonly isDeleted: boolean;
  readonly createdAt: Date;
  readonly collectedAt: Date;
  readonly ignore: boolean;
  readonly payload: unknown;
};

export function createMetadata(options: {
  version: string;
  payload: unknown;
  isDeleted?: boolean;
  createdAt?: Date;
  collectedAt?: Date;
}): Metadata {
  const collectedAt = options.collectedAt ?? new Date();
  return Object.freeze({
    version: options.version,
    isDeleted: options.isDeleted ?? false,
    createdAt: options.createdAt ?? collectedAt,
    collectedAt,
    ignore: false,
    payload: options.payload
  });
}

/**
 * Metadata that the store must not record; used by updaters that only
 * contribute id → resource mappings.
 */
export function createIgnoredMetadata(): Metadata {
  const epoch = new Date(0);
  return Object.freeze({
    version: '',
    isDeleted: false,
    createdAt: epoch,
    collectedAt: epoch,
    ignore: true,
    payload: null
  });
}

/**
 * One query result: the alias ids, the resource they resolve to, and the
 * metadata for that resource.
 *
 * The metadata is handed over to the store exactly once through
 * {@link ResourceMetadata.takeMetadata}; after that the instance no longer
 * references it and any further access throws.
 */
export class ResourceMetadata {
  readonly ids: readonly string[];
  readonly resource: MonitoredResource;
  private current: Metadata | undefined;

  constructor(ids: readonly string[], resource: MonitoredResource, metadata: Metadata) {
    if (ids.length === 0) {
      throw new AgentError(
        ErrorCode.E_METADATA_INVALID,
        `ResourceMetadata for ${resource.type} needs at least one id`
      );
    }
    this.ids = Object.freeze([...ids]);
    this.resource = resource;
    this.current = metadata;
  }

  get metadata(): Metadata {
    return this.ensureAvailable();
  }

  get consumed(): boolean {
    return this.current === undefined;
  }

  takeMetadata(): Metadata {
    const metadata = this.ensureAvailable();
    this.current = undefined;
    return metadata;
  }

  private ensureAvailable(): Metadata {
    if (this.current === undefined) {
      throw new AgentError(
        ErrorCode.E_METADATA_CONSUMED,
        `Metadata for [${this.ids.join(', ')}] was already handed to the store`
      );
    }
    return this.current;
  }
}
