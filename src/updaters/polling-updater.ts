/**
 * Periodic metadata updates driven by a query function
 */

import type { Logger } from 'pino';
import { ErrorCode, toAgentError } from '../core/errors.js';
import type { ResourceMetadata } from '../core/metadata.js';
import type { HealthChecker } from '../health/health-checker.js';
import { createSilentLogger } from '../logger.js';
import type { MetadataStore } from '../storage/metadata-store.js';
import { waitUnlessAborted } from '../utils/cancellable-wait.js';
import { MetadataUpdater, type UpdaterBackend, type UpdateSink } from './updater.js';

/**
 * Returns the current batch of results. Trusted to finish in bounded time;
 * a hung query stalls only its own updater.
 */
export type QueryMetadata = () => ResourceMetadata[] | Promise<ResourceMetadata[]>;

export type PollingUpdaterOptions = {
  name: string;
  /**
   * Seconds between polls; 0 disables polling
   */
  periodSeconds: number;
  queryMetadata: QueryMetadata;
  logger?: Logger;
};

export class PollingMetadataUpdater implements UpdaterBackend {
  private readonly name: string;
  private readonly periodSeconds: number;
  private readonly queryMetadata: QueryMetadata;
  private readonly logger: Logger;
  private controller?: AbortController;
  private loop?: Promise<void>;
  private polls = 0;

  constructor(options: PollingUpdaterOptions) {
    this.name = options.name;
    this.periodSeconds = options.periodSeconds;
    this.queryMetadata = options.queryMetadata;
    this.logger = (options.logger ?? createSilentLogger()).child({ updater: options.name });
  }

  /**
   * Number of completed poll cycles, failed ones included
   */
  get pollCount(): number {
    return this.polls;
  }

  validateConfiguration(): boolean {
    return Number.isFinite(this.periodSeconds) && this.periodSeconds >= 0;
  }

  startUpdater(sink: UpdateSink): void {
    if (this.periodSeconds === 0) {
      this.logger.info(`Polling disabled for the ${this.name} updater (period is 0)`);
      return;
    }
    if (this.loop) return;

    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.pollForMetadata(sink, controller.signal);
  }

  async stopUpdater(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    this.loop = undefined;
    this.controller = undefined;
  }

  private async pollForMetadata(sink: UpdateSink, signal: AbortSignal): Promise<void> {
    const periodMs = this.periodSeconds * 1000;
    do {
      await this.pollOnce(sink);
    } while (await waitUnlessAborted(periodMs, signal));
    this.logger.debug(`Poll loop for ${this.name} finished after ${this.polls} polls`);
  }

  /**
   * One poll cycle. Failures are logged and reported as unhealthy; the loop
   * carries on with the next period.
   */
  private async pollOnce(sink: UpdateSink): Promise<void> {
    try {
      const results = await this.queryMetadata();
      for (const result of results) {
        sink.commit(result);
      }
      sink.setHealthy(true);
      this.logger.trace({ count: results.length }, 'Committed poll results');
    } catch (error) {
      this.logger.error(
        { err: toAgentError(error, ErrorCode.E_UPDATER_QUERY_FAILED, { updater: this.name }) },
        `Polling for ${this.name} metadata failed`
      );
      sink.setHealthy(false);
    } finally {
      this.polls++;
    }
  }
}

/**
 * Wire a polling backend into a lifecycle driver
 */
export function createPollingUpdater(
  options: PollingUpdaterOptions & {
    store: MetadataStore;
    healthChecker?: HealthChecker;
  }
): MetadataUpdater {
  const backend = new PollingMetadataUpdater(options);
  return new MetadataUpdater({
    name: options.name,
    store: options.store,
    backend,
    logger: options.logger,
    healthChecker: options.healthChecker
  });
}
