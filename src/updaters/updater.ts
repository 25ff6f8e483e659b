/**
 * Updater lifecycle driver
 *
 * A concrete update source implements {@link UpdaterBackend}; the driver owns
 * the IDLE → RUNNING → STOPPED state machine and the commits into the store.
 */

import type { Logger } from 'pino';
import { ErrorCode, formatError, toAgentError } from '../core/errors.js';
import type { ResourceMetadata } from '../core/metadata.js';
import type { HealthChecker } from '../health/health-checker.js';
import { createSilentLogger } from '../logger.js';
import type { MetadataStore } from '../storage/metadata-store.js';
import { createEventEmitter, type EventEmitter } from '../utils/events.js';

export enum UpdaterState {
  IDLE = 'idle',
  RUNNING = 'running',
  STOPPED = 'stopped'
}

const VALID_TRANSITIONS: Record<UpdaterState, UpdaterState[]> = {
  [UpdaterState.IDLE]: [UpdaterState.RUNNING],
  [UpdaterState.RUNNING]: [UpdaterState.STOPPED],
  [UpdaterState.STOPPED]: []
};

export type UpdaterTransitionEvent = {
  updater: string;
  from: UpdaterState;
  to: UpdaterState;
  reason?: string;
  timestamp: string;
};

type UpdaterEvents = {
  transition: UpdaterTransitionEvent;
};

/**
 * Write access handed to a backend while it runs
 */
export type UpdateSink = {
  /**
   * Map every id of `result` to its resource. The resource is shared, not consumed.
   */
  updateResource(result: ResourceMetadata): void;
  /**
   * Hand the metadata of `result` to the store. Consumes it.
   */
  updateMetadata(result: ResourceMetadata): void;
  /**
   * Resource first, then metadata, so readers never see metadata for an
   * unregistered id.
   */
  commit(result: ResourceMetadata): void;
  setHealthy(healthy: boolean): void;
};

/**
 * Hooks a concrete update source provides
 */
export interface UpdaterBackend {
  /**
   * Checked before anything is started; false keeps the updater IDLE
   */
  validateConfiguration(): boolean;
  startUpdater(sink: UpdateSink): void;
  /**
   * Must resolve only after all background work has finished
   */
  stopUpdater(): Promise<void>;
}

export type MetadataUpdaterOptions = {
  name: string;
  store: MetadataStore;
  backend: UpdaterBackend;
  logger?: Logger;
  healthChecker?: HealthChecker;
};

export class MetadataUpdater {
  readonly name: string;
  private readonly store: MetadataStore;
  private readonly backend: UpdaterBackend;
  private readonly logger: Logger;
  private readonly healthChecker?: HealthChecker;
  private readonly events: EventEmitter<UpdaterEvents>;
  private readonly sink: UpdateSink;
  private currentState = UpdaterState.IDLE;
  private stopping?: Promise<void>;

  constructor(options: MetadataUpdaterOptions) {
    this.name = options.name;
    this.store = options.store;
    this.backend = options.backend;
    this.healthChecker = options.healthChecker;
    this.logger = (options.logger ?? createSilentLogger()).child({ updater: options.name });
    this.events = createEventEmitter<UpdaterEvents>(this.logger);
    this.sink = {
      updateResource: (result) => this.updateResource(result),
      updateMetadata: (result) => this.updateMetadata(result),
      commit: (result) => {
        this.updateResource(result);
        this.updateMetadata(result);
      },
      setHealthy: (healthy) => this.setHealthy(healthy)
    };
  }

  get state(): UpdaterState {
    return this.currentState;
  }

  isRunning(): boolean {
    return this.currentState === UpdaterState.RUNNING;
  }

  /**
   * Validate the configuration and start the backend.
   * A validation failure is logged and leaves the updater IDLE.
   */
  start(): void {
    if (this.currentState !== UpdaterState.IDLE) {
      this.logger.warn(`Ignoring start of ${this.name} updater in state ${this.currentState}`);
      return;
    }

    if (!this.validateConfiguration()) {
      this.logger.error(`Failed to validate configuration for the ${this.name} updater`);
      return;
    }

    this.transition(UpdaterState.RUNNING, 'started');
    try {
      this.backend.startUpdater(this.sink);
    } catch (error) {
      this.logger.error(
        { err: toAgentError(error, ErrorCode.E_UPDATER_START_FAILED, { updater: this.name }) },
        `Failed to start the ${this.name} updater`
      );
      this.transition(UpdaterState.STOPPED, `start failed: ${formatError(error)}`);
    }
  }

  /**
   * Stop the backend and wait for it. Safe to call any number of times.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.currentState !== UpdaterState.RUNNING) return Promise.resolve();

    this.stopping = this.stopBackend();
    return this.stopping;
  }

  on<E extends keyof UpdaterEvents>(event: E, handler: (data: UpdaterEvents[E]) => void): void {
    this.events.on(event, handler);
  }

  off<E extends keyof UpdaterEvents>(event: E, handler: (data: UpdaterEvents[E]) => void): void {
    this.events.off(event, handler);
  }

  private validateConfiguration(): boolean {
    try {
      return this.backend.validateConfiguration();
    } catch (error) {
      this.logger.error({ err: error }, 'Configuration validation threw');
      return false;
    }
  }

  private async stopBackend(): Promise<void> {
    try {
      await this.backend.stopUpdater();
    } catch (error) {
      this.logger.error({ err: error }, `Error while stopping the ${this.name} updater`);
    } finally {
      this.transition(UpdaterState.STOPPED, 'stopped');
    }
  }

  private updateResource(result: ResourceMetadata): void {
    this.store.updateResource(result.ids, result.resource);
  }

  private updateMetadata(result: ResourceMetadata): void {
    this.store.updateMetadata(result.resource, result.takeMetadata());
  }

  private setHealthy(healthy: boolean): void {
    if (!this.healthChecker) return;
    if (healthy) {
      this.healthChecker.setHealthy(this.name);
    } else {
      this.healthChecker.setUnhealthy(this.name);
    }
  }

  private transition(to: UpdaterState, reason?: string): void {
    const from = this.currentState;
    if (!VALID_TRANSITIONS[from].includes(to)) {
      this.logger.warn(`Invalid state transition for ${this.name}: ${from} -> ${to}`);
      return;
    }
    this.currentState = to;
    this.logger.debug({ from, to, reason }, 'Updater state changed');
    this.events.emit('transition', {
      updater: this.name,
      from,
      to,
      reason,
      timestamp: new Date().toISOString()
    });
  }
}
