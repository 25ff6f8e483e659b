import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ErrorCode } from '../core/errors.js';
import { createSilentLogger } from '../logger.js';
import { applyOverrides, loadConfig, parseConfigText } from './loader.js';
import { defaultConfig } from './schema.js';

const logger = createSilentLogger();

describe('parseConfigText', () => {
  it('accepts comments and trailing commas', () => {
    const text = `{
      // local API
      "metadataApi": { "port": 9000, },
    }`;

    expect(parseConfigText(text)).toEqual({ metadataApi: { port: 9000 } });
  });

  it('treats an empty document as empty configuration', () => {
    expect(parseConfigText('')).toEqual({});
  });

  it('reports the first syntax error', () => {
    try {
      parseConfigText('{ "port": }');
      expect.unreachable();
    } catch (error) {
      expect(error).toMatchObject({
        code: ErrorCode.E_CONFIG_PARSE_ERROR,
        message: 'Invalid JSON in configuration file: ValueExpected at offset 10'
      });
    }
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'metadatad-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const path = join(dir, name);
    writeFileSync(path, content);
    return path;
  }

  it('returns defaults without a path', async () => {
    const loaded = await loadConfig(undefined, logger);

    expect(loaded.exists).toBe(false);
    expect(loaded.data).toEqual(defaultConfig());
    expect(loaded.data.metadataApi).toEqual({
      host: '0.0.0.0',
      port: 8000,
      numThreads: 3,
      shutdownTimeoutMs: 5000
    });
  });

  it('returns defaults when the file does not exist', async () => {
    const path = join(dir, 'missing.jsonc');
    const loaded = await loadConfig(path, logger);

    expect(loaded).toEqual({ path, exists: false, data: defaultConfig() });
  });

  it('loads, expands and validates a file', async () => {
    const path = write(
      'agent.jsonc',
      `{
        "verboseLogging": true,
        "metadataApi": { "port": 8799, "numThreads": 5 },
        "instance": { "instanceId": "\${INSTANCE_ID}", "zone": "\${ZONE:-us-east1-b}" }
      }`
    );

    const loaded = await loadConfig(path, logger, (key) =>
      key === 'INSTANCE_ID' ? '4242' : undefined
    );

    expect(loaded.exists).toBe(true);
    expect(loaded.data.verboseLogging).toBe(true);
    expect(loaded.data.metadataApi).toEqual({
      host: '0.0.0.0',
      port: 8799,
      numThreads: 5,
      shutdownTimeoutMs: 5000
    });
    expect(loaded.data.instance).toEqual({
      enabled: true,
      resourceType: 'gce_instance',
      instanceId: '4242',
      zone: 'us-east1-b',
      labels: {},
      updateIntervalSeconds: 60
    });
  });

  it('rejects unknown keys', async () => {
    const path = write('agent.json', '{ "metadataApi": { "threads": 2 } }');

    await expect(loadConfig(path, logger)).rejects.toMatchObject({
      code: ErrorCode.E_CONFIG_INVALID
    });
  });

  it('rejects invalid values with their path', async () => {
    const path = write('agent.json', '{ "metadataApi": { "numThreads": 0 } }');

    await expect(loadConfig(path, logger)).rejects.toThrow(
      'Invalid configuration:\n  - metadataApi.numThreads: Number must be greater than or equal to 1'
    );
  });

  it('rejects missing environment variables', async () => {
    const path = write('agent.json', '{ "instance": { "instanceId": "${NOT_SET}" } }');

    await expect(loadConfig(path, logger, () => undefined)).rejects.toThrow(
      'Missing required environment variables: NOT_SET'
    );
  });
});

describe('applyOverrides', () => {
  it('lets command-line values win', () => {
    const config = applyOverrides(defaultConfig(), {
      host: '127.0.0.1',
      port: 0,
      numThreads: 8,
      verboseLogging: true,
      logLevel: 'debug'
    });

    expect(config.metadataApi).toEqual({
      host: '127.0.0.1',
      port: 0,
      numThreads: 8,
      shutdownTimeoutMs: 5000
    });
    expect(config.verboseLogging).toBe(true);
    expect(config.logLevel).toBe('debug');
  });

  it('keeps file values that are not overridden', () => {
    const base = applyOverrides(defaultConfig(), { port: 9100 });

    expect(applyOverrides(base, {})).toEqual(base);
  });

  it('validates overridden values', () => {
    expect(() => applyOverrides(defaultConfig(), { numThreads: 0 })).toThrow(
      'metadataApi.numThreads'
    );
  });
});
