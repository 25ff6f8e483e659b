/**
 * Configuration Loader
 *
 * Loads and validates configuration files.
 * Supports JSON and JSONC (with comments), expands ${VAR} placeholders
 * and validates the result with Zod.
 */

import { existsSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import { type ParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import type { Logger } from 'pino';
import { AgentError, ErrorCode, isAgentError } from '../core/errors.js';
import type { LogLevel } from '../logger.js';
import { expandConfig, type GetEnv, validateEnvironmentVariables } from './env-expander.js';
import { type AgentConfig, formatConfigError, safeParseConfig } from './schema.js';

export type LoadedConfig = {
  path?: string;
  exists: boolean;
  data: AgentConfig;
};

/**
 * Values given on the command line; they win over the file
 */
export type ConfigOverrides = {
  host?: string;
  port?: number;
  numThreads?: number;
  verboseLogging?: boolean;
  logLevel?: LogLevel;
};

function validate(value: unknown, configPath?: string): AgentConfig {
  const parseResult = safeParseConfig(value);
  if (!parseResult.success) {
    throw new AgentError(ErrorCode.E_CONFIG_INVALID, formatConfigError(parseResult.error), {
      context: { configPath }
    });
  }
  return parseResult.data;
}

/**
 * Parse JSONC text into a plain value
 * @throws AgentError with the offset of the first syntax error
 */
export function parseConfigText(content: string, configPath?: string): unknown {
  const errors: ParseError[] = [];
  const parsed: unknown = parseJsonc(content, errors, {
    allowTrailingComma: true,
    allowEmptyContent: true
  });
  const first = errors[0];
  if (first) {
    throw new AgentError(
      ErrorCode.E_CONFIG_PARSE_ERROR,
      `Invalid JSON in configuration file: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      { context: { configPath } }
    );
  }
  return parsed ?? {};
}

/**
 * Load configuration from file. Without a path, or when the file is
 * missing, the validated defaults are returned.
 */
export async function loadConfig(
  configPath: string | undefined,
  logger: Logger,
  getEnv?: GetEnv
): Promise<LoadedConfig> {
  if (!configPath) {
    return { exists: false, data: validate({}) };
  }

  const absolutePath = isAbsolute(configPath) ? configPath : resolve(process.cwd(), configPath);

  if (!existsSync(absolutePath)) {
    logger.debug(`Config file not found: ${absolutePath}, using defaults`);
    return { path: absolutePath, exists: false, data: validate({}) };
  }

  try {
    const content = await readFile(absolutePath, 'utf-8');
    const rawData = parseConfigText(content, absolutePath);

    validateEnvironmentVariables(rawData, getEnv);
    const data = validate(expandConfig(rawData, getEnv), absolutePath);

    logger.debug(`Loaded, expanded, and validated config from ${absolutePath}`);
    return { path: absolutePath, exists: true, data };
  } catch (error) {
    logger.error({ err: error }, `Failed to load config from ${absolutePath}`);
    if (isAgentError(error)) {
      throw error;
    }
    throw new AgentError(
      ErrorCode.E_CONFIG_PARSE_ERROR,
      error instanceof Error ? error.message : String(error),
      { cause: error, context: { configPath: absolutePath } }
    );
  }
}

/**
 * Merge command-line overrides into a loaded configuration and re-validate
 */
export function applyOverrides(config: AgentConfig, overrides: ConfigOverrides): AgentConfig {
  return validate({
    ...config,
    verboseLogging: overrides.verboseLogging ?? config.verboseLogging,
    logLevel: overrides.logLevel ?? config.logLevel,
    metadataApi: {
      ...config.metadataApi,
      host: overrides.host ?? config.metadataApi.host,
      port: overrides.port ?? config.metadataApi.port,
      numThreads: overrides.numThreads ?? config.metadataApi.numThreads
    }
  });
}
