/**
 * Metadata agent
 *
 * Owns the store, the health checker, the updaters and the API server,
 * and starts and stops them in order.
 */

import type { AddressInfo } from 'node:net';
import type { Logger } from 'pino';
import { createMetadataApiServer, type MetadataApiServer } from './api/server.js';
import type { AgentConfig } from './config/schema.js';
import { createHealthChecker, type HealthChecker } from './health/health-checker.js';
import { createSilentLogger } from './logger.js';
import { createMemoryMetadataStore, type MemoryMetadataStore } from './storage/memory-metadata-store.js';
import { createInstanceUpdater } from './updaters/instance-updater.js';
import type { MetadataUpdater } from './updaters/updater.js';
import { waitUnlessAborted } from './utils/cancellable-wait.js';

export class MetadataAgent {
  readonly config: AgentConfig;
  readonly store: MemoryMetadataStore;
  readonly healthChecker: HealthChecker;
  private readonly logger: Logger;
  private readonly updaters: MetadataUpdater[] = [];
  private server?: MetadataApiServer;
  private purgeController?: AbortController;
  private purgeLoop?: Promise<void>;

  constructor(config: AgentConfig, options: { logger?: Logger } = {}) {
    this.config = config;
    this.logger = options.logger ?? createSilentLogger();
    this.store = createMemoryMetadataStore({ logger: this.logger.child({ component: 'store' }) });
    this.healthChecker = createHealthChecker();
  }

  addUpdater(updater: MetadataUpdater): void {
    this.updaters.push(updater);
  }

  getUpdaters(): readonly MetadataUpdater[] {
    return this.updaters;
  }

  /**
   * Start every updater, the purge loop, then the API server. An updater
   * whose configuration is rejected stays idle without affecting the rest.
   */
  async start(): Promise<AddressInfo> {
    for (const updater of this.updaters) {
      updater.start();
    }
    this.startPurging();

    this.server = createMetadataApiServer({
      config: this.config.metadataApi,
      store: this.store,
      healthChecker: this.healthChecker,
      verbose: this.config.verboseLogging,
      logger: this.logger
    });
    return this.server.start();
  }

  async stop(): Promise<void> {
    try {
      await this.server?.stop();
    } catch (error) {
      this.logger.error({ err: error }, 'Failed to stop the metadata API server');
    }

    this.purgeController?.abort();
    await this.purgeLoop;
    this.purgeLoop = undefined;
    this.purgeController = undefined;

    const results = await Promise.allSettled(this.updaters.map((updater) => updater.stop()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.logger.error(
          { err: result.reason },
          `Failed to stop the ${this.updaters[index]?.name ?? 'unknown'} updater`
        );
      }
    });
  }

  private startPurging(): void {
    const periodSeconds = this.config.store.purgeIntervalSeconds;
    if (periodSeconds === 0 || this.purgeLoop) return;

    const controller = new AbortController();
    this.purgeController = controller;
    this.purgeLoop = this.purgeDeletedMetadata(periodSeconds * 1000, controller.signal);
  }

  private async purgeDeletedMetadata(periodMs: number, signal: AbortSignal): Promise<void> {
    while (await waitUnlessAborted(periodMs, signal)) {
      const purged = this.store.purgeDeletedEntries();
      if (purged > 0) {
        this.logger.debug({ purged }, 'Purged deleted metadata');
      }
    }
  }
}

/**
 * Agent wired with the updaters enabled in the configuration
 */
export function createAgent(config: AgentConfig, options: { logger?: Logger } = {}): MetadataAgent {
  const agent = new MetadataAgent(config, options);

  if (config.instance.enabled) {
    agent.addUpdater(
      createInstanceUpdater({
        config: config.instance,
        store: agent.store,
        logger: options.logger,
        healthChecker: agent.healthChecker
      })
    );
  }

  return agent;
}
