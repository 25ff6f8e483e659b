/**
 * Local metadata API server
 *
 * Hono on a Node HTTP server. Every request goes through the dispatcher
 * under a pool of `numThreads` permits, so at most that many requests are
 * dispatched at once and the rest queue.
 */

import { createServer, type Server } from 'node:http';
import type { AddressInfo, Socket } from 'node:net';
import { getRequestListener, type HttpBindings } from '@hono/node-server';
import { type Context, Hono } from 'hono';
import type { Logger } from 'pino';
import type { MetadataApiConfig } from '../config/schema.js';
import { AgentError, ErrorCode } from '../core/errors.js';
import type { HealthChecker } from '../health/health-checker.js';
import { createSilentLogger } from '../logger.js';
import type { MetadataStore } from '../storage/metadata-store.js';
import { createSemaphore, type Semaphore } from '../utils/concurrency.js';
import { type DispatchRequest, Dispatcher, type Route } from './dispatcher.js';
import {
  createHealthzHandler,
  createMonitoredResourceHandler,
  HEALTHZ_PATH,
  MONITORED_RESOURCE_PREFIX
} from './handlers.js';

// Absent when a request is served in process through app.request()
type ServerEnv = { Bindings: Partial<HttpBindings> };

export type MetadataApiServerOptions = {
  dispatcher: Dispatcher;
  host: string;
  port: number;
  numThreads: number;
  shutdownTimeoutMs?: number;
  logger?: Logger;
};

/**
 * Request target exactly as the client sent it: no dot-segment
 * normalization, query string included.
 */
function requestTarget(c: Context<ServerEnv>): string {
  const raw = c.env.incoming?.url;
  if (raw !== undefined) return raw;
  const url = new URL(c.req.url);
  return url.pathname + url.search;
}

async function toDispatchRequest(c: Context<ServerEnv>): Promise<DispatchRequest> {
  const headers: Record<string, string> = {};
  c.req.raw.headers.forEach((value, name) => {
    headers[name] = value;
  });
  return {
    method: c.req.method,
    path: requestTarget(c),
    headers,
    body: await c.req.text()
  };
}

export class MetadataApiServer {
  private readonly app: Hono<ServerEnv>;
  private readonly dispatcher: Dispatcher;
  private readonly host: string;
  private readonly port: number;
  private readonly shutdownTimeoutMs: number;
  private readonly logger: Logger;
  private readonly pool: Semaphore;
  private readonly sockets = new Set<Socket>();
  private server?: Server;
  private stopping?: Promise<void>;
  private draining = false;

  constructor(options: MetadataApiServerOptions) {
    this.dispatcher = options.dispatcher;
    this.host = options.host;
    this.port = options.port;
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 5000;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'api' });
    this.pool = createSemaphore(options.numThreads);

    this.app = new Hono<ServerEnv>();
    this.app.all('*', async (c) => {
      const request = await toDispatchRequest(c);
      const response = await this.pool.withPermit(() => this.dispatcher.dispatch(request));
      if (this.draining) {
        // Keep-alive sockets would otherwise hold stop() until the timeout
        response.headers.set('Connection', 'close');
      }
      return response;
    });
    this.app.onError((error, c) => {
      this.logger.error({ err: error }, `Unhandled error for ${c.req.method} ${c.req.path}`);
      return c.json({ status_code: 500, error: 'Internal server error' }, 500);
    });
  }

  /**
   * Serve one request in process, without a socket
   */
  request(path: string, init?: RequestInit): Promise<Response> {
    return Promise.resolve(this.app.request(path, init, {}));
  }

  /**
   * Requests currently holding a dispatch permit
   */
  inFlight(): number {
    return this.pool.inUse();
  }

  address(): AddressInfo | undefined {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address : undefined;
  }

  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new AgentError(ErrorCode.E_SERVER_LISTEN_FAILED, 'Metadata API server already started');
    }

    const server = createServer(getRequestListener(this.app.fetch));
    server.on('connection', (socket: Socket) => {
      this.sockets.add(socket);
      socket.on('close', () => this.sockets.delete(socket));
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        reject(
          new AgentError(
            ErrorCode.E_SERVER_LISTEN_FAILED,
            `Failed to listen on ${this.host}:${this.port}: ${error.message}`,
            { cause: error }
          )
        );
      };
      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    this.server = server;
    this.stopping = undefined;
    this.draining = false;
    const address = this.address();
    if (!address) {
      throw new AgentError(ErrorCode.E_SERVER_LISTEN_FAILED, 'Server has no TCP address');
    }
    this.logger.info(
      `Metadata API listening on http://${address.address}:${address.port} (${this.pool.available()} threads)`
    );
    return address;
  }

  /**
   * Stop accepting connections and wait for in-flight requests. Connections
   * still open after the shutdown timeout are closed forcibly.
   */
  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.stopping ??= this.shutdown(server);
    return this.stopping;
  }

  private async shutdown(server: Server): Promise<void> {
    this.logger.info(`Stopping metadata API server (timeout=${this.shutdownTimeoutMs}ms)`);
    this.draining = true;

    const closed = new Promise<void>((resolve) => server.close(() => resolve()));
    server.closeIdleConnections();

    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), this.shutdownTimeoutMs);
    });
    const drained = this.pool
      .drained()
      .then(() => {
        // Sockets whose last request finished after the first sweep
        server.closeIdleConnections();
        return closed;
      })
      .then(() => true);

    const finished = await Promise.race([drained, timedOut]);
    clearTimeout(timer);

    if (!finished) {
      this.logger.warn(`Forcing close of ${this.sockets.size} sockets`);
      server.closeAllConnections();
      for (const socket of this.sockets) socket.destroy();
      await closed;
    }

    this.sockets.clear();
    this.server = undefined;
    this.logger.info('Metadata API server stopped');
  }
}

/**
 * Route table of the local metadata API
 */
export function buildRoutes(options: {
  store: MetadataStore;
  healthChecker: HealthChecker;
  logger: Logger;
  verbose: boolean;
}): Route[] {
  return [
    {
      method: 'GET',
      prefix: MONITORED_RESOURCE_PREFIX,
      handler: createMonitoredResourceHandler(options)
    },
    {
      method: 'GET',
      prefix: HEALTHZ_PATH,
      handler: createHealthzHandler(options)
    }
  ];
}

export function createMetadataApiServer(options: {
  config: MetadataApiConfig;
  store: MetadataStore;
  healthChecker: HealthChecker;
  verbose?: boolean;
  logger?: Logger;
}): MetadataApiServer {
  const logger = options.logger ?? createSilentLogger();
  const verbose = options.verbose ?? false;
  const dispatcher = new Dispatcher(
    buildRoutes({ store: options.store, healthChecker: options.healthChecker, logger, verbose }),
    { verbose, logger, matchPolicy: 'longest' }
  );

  return new MetadataApiServer({
    dispatcher,
    host: options.config.host,
    port: options.config.port,
    numThreads: options.config.numThreads,
    shutdownTimeoutMs: options.config.shutdownTimeoutMs,
    logger
  });
}
