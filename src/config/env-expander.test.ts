import { describe, expect, it } from 'vitest';
import { ErrorCode } from '../core/errors.js';
import {
  expandConfig,
  expandEnvironmentVariables,
  type GetEnv,
  validateEnvironmentVariables
} from './env-expander.js';

const env: Record<string, string> = {
  INSTANCE_ID: '123',
  ZONE: 'us-central1-a',
  EMPTY: ''
};
const getEnv: GetEnv = (key) => env[key];

describe('expandEnvironmentVariables', () => {
  it('replaces defined variables', () => {
    expect(expandEnvironmentVariables('${ZONE}/${INSTANCE_ID}', getEnv)).toBe('us-central1-a/123');
  });

  it('falls back to the default for undefined variables', () => {
    expect(expandEnvironmentVariables('${PORT:-8000}', getEnv)).toBe('8000');
    expect(expandEnvironmentVariables('${EMPTY:-unused}', getEnv)).toBe('');
  });

  it('leaves text without placeholders alone', () => {
    expect(expandEnvironmentVariables('$ZONE and {ZONE}', getEnv)).toBe('$ZONE and {ZONE}');
  });

  it('throws for undefined variables without default', () => {
    expect(() => expandEnvironmentVariables('${MISSING}', getEnv)).toThrow(
      "Environment variable 'MISSING' is not defined and no default value provided"
    );
  });
});

describe('expandConfig', () => {
  it('expands nested strings and keeps other values', () => {
    const input = {
      instance: { instanceId: '${INSTANCE_ID}', labels: { zone: '${ZONE}' } },
      metadataApi: { port: 8000 },
      list: ['${ZONE}', true, null]
    };

    expect(expandConfig(input, getEnv)).toEqual({
      instance: { instanceId: '123', labels: { zone: 'us-central1-a' } },
      metadataApi: { port: 8000 },
      list: ['us-central1-a', true, null]
    });
    expect(input.instance.instanceId).toBe('${INSTANCE_ID}');
  });
});

describe('validateEnvironmentVariables', () => {
  it('accepts configuration whose variables are all resolvable', () => {
    expect(() =>
      validateEnvironmentVariables({ a: '${ZONE}', b: ['${OTHER:-x}'] }, getEnv)
    ).not.toThrow();
  });

  it('lists every missing variable once, sorted', () => {
    try {
      validateEnvironmentVariables({ a: '${B_VAR}', b: ['${A_VAR}', '${B_VAR}'] }, getEnv);
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        code: ErrorCode.E_CONFIG_ENV_MISSING,
        message: 'Missing required environment variables: A_VAR, B_VAR'
      });
    }
  });
});
