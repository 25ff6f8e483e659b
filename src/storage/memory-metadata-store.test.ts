import { beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode, ResourceNotFoundError } from '../core/errors.js';
import { createIgnoredMetadata, createMetadata } from '../core/metadata.js';
import { createMonitoredResource } from '../core/resource.js';
import { createMemoryMetadataStore, type MemoryMetadataStore } from './memory-metadata-store.js';

const container = createMonitoredResource('docker_container', { container_id: 'abcdef' });
const instance = createMonitoredResource('gce_instance', { zone: 'us-central1-a' });

describe('MemoryMetadataStore', () => {
  let store: MemoryMetadataStore;

  beforeEach(() => {
    store = createMemoryMetadataStore();
  });

  describe('resources', () => {
    it('maps every alias id to the same resource', () => {
      store.updateResource(['abc', 'abcdef'], container);

      expect(store.lookupResource('abc')).toBe(container);
      expect(store.lookupResource('abcdef')).toBe(container);
      expect(store.resourceCount()).toBe(2);
    });

    it('throws ResourceNotFoundError for unknown ids', () => {
      store.updateResource(['123'], instance);

      expect(() => store.lookupResource('999')).toThrow(ResourceNotFoundError);
      expect(() => store.lookupResource('999')).toThrow("No resource registered for id '999'");
    });

    it('replaces an existing mapping', () => {
      store.updateResource(['123'], container);
      store.updateResource(['123'], instance);

      expect(store.lookupResource('123')).toBe(instance);
    });

    it('treats the empty id as an ordinary key', () => {
      store.updateResource([''], instance);

      expect(store.lookupResource('')).toBe(instance);
    });

    it('ignores an empty id list', () => {
      store.updateResource([], instance);

      expect(store.resourceCount()).toBe(0);
    });
  });

  describe('metadata', () => {
    it('looks metadata up by resource value', () => {
      const metadata = createMetadata({ version: '1', payload: { name: 'web' } });
      store.updateMetadata(container, metadata);

      const equal = createMonitoredResource('docker_container', { container_id: 'abcdef' });
      expect(store.lookupMetadata(equal)).toBe(metadata);
      expect(store.lookupMetadata(instance)).toBeUndefined();
    });

    it('skips ignored metadata', () => {
      store.updateMetadata(container, createIgnoredMetadata());

      expect(store.getMetadataMap()).toEqual([]);
    });

    it('keeps the newer of two collections', () => {
      const newer = createMetadata({
        version: '2',
        payload: null,
        collectedAt: new Date('2024-01-01T00:00:10Z')
      });
      const older = createMetadata({
        version: '1',
        payload: null,
        collectedAt: new Date('2024-01-01T00:00:00Z')
      });

      store.updateMetadata(container, newer);
      store.updateMetadata(container, older);

      expect(store.lookupMetadata(container)?.version).toBe('2');
    });

    it('replaces metadata collected at the same time', () => {
      const collectedAt = new Date('2024-01-01T00:00:00Z');
      store.updateMetadata(container, createMetadata({ version: '1', payload: null, collectedAt }));
      store.updateMetadata(container, createMetadata({ version: '2', payload: null, collectedAt }));

      expect(store.lookupMetadata(container)?.version).toBe('2');
    });

    it('returns a snapshot of every entry', () => {
      const first = createMetadata({ version: '1', payload: 'a' });
      const second = createMetadata({ version: '1', payload: 'b' });
      store.updateMetadata(container, first);
      store.updateMetadata(instance, second);

      const snapshot = store.getMetadataMap();
      expect(snapshot).toEqual([
        { resource: container, metadata: first },
        { resource: instance, metadata: second }
      ]);

      store.clear();
      expect(snapshot).toHaveLength(2);
      expect(store.getMetadataMap()).toEqual([]);
    });

    it('purges entries marked as deleted', () => {
      store.updateMetadata(container, createMetadata({ version: '1', payload: null, isDeleted: true }));
      store.updateMetadata(instance, createMetadata({ version: '1', payload: null }));

      expect(store.purgeDeletedEntries()).toBe(1);
      expect(store.lookupMetadata(container)).toBeUndefined();
      expect(store.lookupMetadata(instance)).toBeDefined();
      expect(store.purgeDeletedEntries()).toBe(0);
    });
  });

  it('reports a not-found error with its code', () => {
    try {
      store.lookupResource('missing');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({ code: ErrorCode.E_STORE_NOT_FOUND, resourceId: 'missing' });
    }
  });
});
