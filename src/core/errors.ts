/**
 * Error types for metadatad
 *
 * Standardized error codes shared by the store, the updaters and the API.
 */

/**
 * Error codes for different error types
 */
export const ErrorCode = {
  E_CONFIG_INVALID: 'E_CONFIG_INVALID',
  E_CONFIG_PARSE_ERROR: 'E_CONFIG_PARSE_ERROR',
  E_CONFIG_ENV_MISSING: 'E_CONFIG_ENV_MISSING',
  E_STORE_NOT_FOUND: 'E_STORE_NOT_FOUND',
  E_METADATA_INVALID: 'E_METADATA_INVALID',
  E_METADATA_CONSUMED: 'E_METADATA_CONSUMED',
  E_UPDATER_START_FAILED: 'E_UPDATER_START_FAILED',
  E_UPDATER_QUERY_FAILED: 'E_UPDATER_QUERY_FAILED',
  E_SERVER_HANDLER_FAILED: 'E_SERVER_HANDLER_FAILED',
  E_SERVER_LISTEN_FAILED: 'E_SERVER_LISTEN_FAILED',
  E_UNKNOWN: 'E_UNKNOWN'
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Extra information attached to an error for logging
 */
export type ErrorContext = {
  updater?: string;
  resourceId?: string;
  configPath?: string;
  [key: string]: unknown;
};

export class AgentError extends Error {
  readonly code: ErrorCodeType;
  readonly context: ErrorContext;

  constructor(
    code: ErrorCodeType,
    message: string,
    options?: { cause?: unknown; context?: ErrorContext }
  ) {
    super(message);
    this.name = 'AgentError';
    this.code = code;
    this.context = options?.context ?? {};
    if (options?.cause) this.cause = options.cause;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context
    };
  }
}

/**
 * Raised by a store lookup for an id nobody registered.
 * Expected on the hot path; the API turns it into a 404.
 */
export class ResourceNotFoundError extends AgentError {
  readonly resourceId: string;

  constructor(resourceId: string) {
    super(ErrorCode.E_STORE_NOT_FOUND, `No resource registered for id '${resourceId}'`, {
      context: { resourceId }
    });
    this.name = 'ResourceNotFoundError';
    this.resourceId = resourceId;
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

export function isResourceNotFound(error: unknown): error is ResourceNotFoundError {
  return error instanceof ResourceNotFoundError;
}

/**
 * Wrap an unknown thrown value into an AgentError
 */
export function toAgentError(
  error: unknown,
  code: ErrorCodeType = ErrorCode.E_UNKNOWN,
  context?: ErrorContext
): AgentError {
  if (error instanceof AgentError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new AgentError(code, message, { cause: error, context });
}

/**
 * One-line description of a thrown value, for log records
 */
export function formatError(error: unknown): string {
  if (error instanceof AgentError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
