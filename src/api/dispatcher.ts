/**
 * Request dispatcher
 *
 * Resolves a request to handlers by (method, path prefix). The route table is
 * sorted once at construction and never changes afterwards, so concurrent
 * dispatches share it without coordination.
 */

import type { Logger } from 'pino';
import { ErrorCode, toAgentError } from '../core/errors.js';
import { createSilentLogger } from '../logger.js';

export type DispatchRequest = {
  method: string;
  path: string;
  headers: Record<string, string>;
  body: string;
};

export const JSON_HEADERS = { 'Content-Type': 'application/json' } as const;

/**
 * Accumulates what handlers write; converted to a Response once every
 * matching handler has run.
 */
export class ResponseWriter {
  private status = 200;
  private readonly headers = new Headers();
  private readonly chunks: string[] = [];

  setStatus(status: number): void {
    this.status = status;
  }

  setHeaders(headers: Record<string, string>): void {
    for (const [name, value] of Object.entries(headers)) {
      this.headers.set(name, value);
    }
  }

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  get statusCode(): number {
    return this.status;
  }

  get body(): string {
    return this.chunks.join('');
  }

  toResponse(): Response {
    const body = this.body;
    return new Response(body.length > 0 ? body : null, {
      status: this.status,
      headers: this.headers
    });
  }
}

export function writeJsonError(response: ResponseWriter, status: number, message: string): void {
  response.setStatus(status);
  response.setHeaders(JSON_HEADERS);
  response.write(JSON.stringify({ status_code: status, error: message }));
}

export type RouteHandler = (
  request: DispatchRequest,
  response: ResponseWriter
) => void | Promise<void>;

export type Route = {
  method: string;
  prefix: string;
  handler: RouteHandler;
};

/**
 * 'longest': only the most specific matching route runs.
 * 'all': every matching route runs, most specific first, sharing one response.
 */
export type MatchPolicy = 'longest' | 'all';

export type DispatcherOptions = {
  verbose?: boolean;
  logger?: Logger;
  matchPolicy?: MatchPolicy;
};

function compareKeys(a: Route, b: Route): number {
  if (a.method !== b.method) return a.method < b.method ? -1 : 1;
  if (a.prefix !== b.prefix) return a.prefix < b.prefix ? -1 : 1;
  return 0;
}

export class Dispatcher {
  private readonly routes: readonly Route[];
  private readonly verbose: boolean;
  private readonly logger: Logger;
  readonly matchPolicy: MatchPolicy;

  constructor(routes: readonly Route[], options: DispatcherOptions = {}) {
    // Descending (method, prefix): a prefix sorts after every prefix it extends,
    // so the most specific match is visited first.
    this.routes = Object.freeze([...routes].sort((a, b) => compareKeys(b, a)));
    this.verbose = options.verbose ?? false;
    this.logger = options.logger ?? createSilentLogger();
    this.matchPolicy = options.matchPolicy ?? 'longest';
  }

  /**
   * Routes that would handle `method path`, in invocation order
   */
  resolve(method: string, path: string): Route[] {
    const matches: Route[] = [];
    for (const route of this.routes) {
      if (route.method !== method || !path.startsWith(route.prefix)) {
        continue;
      }
      matches.push(route);
      if (this.matchPolicy === 'longest') break;
    }
    return matches;
  }

  async dispatch(request: DispatchRequest): Promise<Response> {
    if (this.verbose) {
      this.logger.info(
        { headers: request.headers, body: request.body },
        `Dispatcher called: ${request.method} ${request.path}`
      );
    }

    const response = new ResponseWriter();
    const matches = this.resolve(request.method, request.path);
    if (matches.length === 0) {
      if (this.verbose) {
        this.logger.warn(`No handler for ${request.method} ${request.path}`);
      }
      writeJsonError(response, 404, 'Not found');
      return response.toResponse();
    }

    try {
      for (const route of matches) {
        this.logger.trace(`Handler found for ${request.method} ${request.path}: ${route.prefix}`);
        await route.handler(request, response);
      }
    } catch (error) {
      this.logger.error(
        { err: toAgentError(error, ErrorCode.E_SERVER_HANDLER_FAILED, { path: request.path }) },
        `Handler failed for ${request.method} ${request.path}`
      );
      const failure = new ResponseWriter();
      writeJsonError(failure, 500, 'Internal server error');
      return failure.toResponse();
    }

    return response.toResponse();
  }
}
