/**
 * Environment variable expansion for configuration files
 *
 * Supports:
 * - ${VAR} - expands to the value of VAR
 * - ${VAR:-default} - expands to VAR if set, otherwise uses default
 */

import { AgentError, ErrorCode } from '../core/errors.js';

export type GetEnv = (key: string) => string | undefined;

const defaultGetEnv: GetEnv = (key) => process.env[key];

const PLACEHOLDER = /\$\{([^}:]+)(?::-([^}]*))?\}/g;

/**
 * Expand environment variables in a string
 * @throws AgentError when a variable without default is undefined
 */
export function expandEnvironmentVariables(value: string, getEnv: GetEnv = defaultGetEnv): string {
  return value.replace(PLACEHOLDER, (_match, varName: string, defaultValue?: string) => {
    const envValue = getEnv(varName);
    if (envValue !== undefined) {
      return envValue;
    }
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new AgentError(
      ErrorCode.E_CONFIG_ENV_MISSING,
      `Environment variable '${varName}' is not defined and no default value provided`
    );
  });
}

/**
 * Expand every string in a parsed configuration document.
 * Returns a new value; the input is left untouched.
 */
export function expandConfig(config: unknown, getEnv: GetEnv = defaultGetEnv): unknown {
  if (typeof config === 'string') {
    return expandEnvironmentVariables(config, getEnv);
  }
  if (Array.isArray(config)) {
    return config.map((item: unknown) => expandConfig(item, getEnv));
  }
  if (config && typeof config === 'object') {
    const expanded: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(config)) {
      expanded[key] = expandConfig(value, getEnv);
    }
    return expanded;
  }
  return config;
}

/**
 * Collect every required variable that is missing, without expanding
 * @throws AgentError listing all missing variables
 */
export function validateEnvironmentVariables(
  config: unknown,
  getEnv: GetEnv = defaultGetEnv
): void {
  const missingVars = new Set<string>();

  const visit = (value: unknown): void => {
    if (typeof value === 'string') {
      for (const match of value.matchAll(PLACEHOLDER)) {
        const [, varName, defaultValue] = match;
        if (varName && defaultValue === undefined && getEnv(varName) === undefined) {
          missingVars.add(varName);
        }
      }
    } else if (Array.isArray(value)) {
      value.forEach(visit);
    } else if (value && typeof value === 'object') {
      Object.values(value).forEach(visit);
    }
  };

  visit(config);

  if (missingVars.size > 0) {
    const varList = Array.from(missingVars).sort().join(', ');
    throw new AgentError(
      ErrorCode.E_CONFIG_ENV_MISSING,
      `Missing required environment variables: ${varList}`
    );
  }
}
