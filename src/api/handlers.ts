/**
 * Route handlers for the local metadata API
 */

import type { Logger } from 'pino';
import { isResourceNotFound } from '../core/errors.js';
import { formatMonitoredResource, monitoredResourceToJSON } from '../core/resource.js';
import type { HealthChecker } from '../health/health-checker.js';
import type { MetadataStore } from '../storage/metadata-store.js';
import { JSON_HEADERS, type RouteHandler, writeJsonError } from './dispatcher.js';

export const MONITORED_RESOURCE_PREFIX = '/monitoredResource/';
export const HEALTHZ_PATH = '/healthz';

function decodeId(raw: string): string {
  try {
    return decodeURIComponent(raw);
  } catch {
    // Malformed escapes: look the id up exactly as sent
    return raw;
  }
}

/**
 * GET /monitoredResource/{id}
 */
export function createMonitoredResourceHandler(options: {
  store: MetadataStore;
  logger: Logger;
  verbose?: boolean;
}): RouteHandler {
  const { store, logger, verbose = false } = options;

  return (request, response) => {
    const id = decodeId(request.path.slice(MONITORED_RESOURCE_PREFIX.length));
    if (verbose) {
      logger.info(`Handler called for ${id}`);
    }

    try {
      const resource = store.lookupResource(id);
      if (verbose) {
        logger.info(`Found resource for ${id}: ${formatMonitoredResource(resource)}`);
      }
      response.setStatus(200);
      response.setHeaders(JSON_HEADERS);
      response.write(JSON.stringify(monitoredResourceToJSON(resource)));
    } catch (error) {
      if (!isResourceNotFound(error)) {
        throw error;
      }
      if (verbose) {
        logger.warn(`No matching resource for ${id}`);
      }
      writeJsonError(response, 404, 'Not found');
    }
  };
}

/**
 * GET /healthz
 */
export function createHealthzHandler(options: { healthChecker: HealthChecker }): RouteHandler {
  const { healthChecker } = options;

  return (_request, response) => {
    response.setHeaders(JSON_HEADERS);
    if (healthChecker.isHealthy()) {
      response.setStatus(200);
      response.write(JSON.stringify({ status: 'healthy' }));
      return;
    }
    response.setStatus(500);
    response.write(
      JSON.stringify({
        status: 'unhealthy',
        unhealthy_components: healthChecker.unhealthyComponents()
      })
    );
  };
}
