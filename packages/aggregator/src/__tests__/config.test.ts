import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigError } from '@cardinal/core';
import { DEFAULT_SESSION_PROPERTIES, loadConfig, resolveConfig, resolveSession } from '../config';
import { defaultConcurrency } from '../executor';

describe('loadConfig', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'cardinal-config-'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults', async () => {
    expect(await loadConfig()).toEqual({
      cardinalityCacheSize: 100000,
      cardinalityCacheExpirationMs: 300000,
      executorConcurrency: defaultConcurrency(),
      session: {
        earlyReturnEnabled: true,
        pollingIntervalMs: 10,
        lowestCardinalityThreshold: 0.01,
        indexThreshold: 0.2,
      },
    });
  });

  it('applies inline overrides', async () => {
    const config = await loadConfig({
      json: { cardinalityCacheSize: 10, session: { earlyReturnEnabled: false } },
    });

    expect(config.cardinalityCacheSize).toBe(10);
    expect(config.cardinalityCacheExpirationMs).toBe(300000);
    expect(config.session).toEqual({ ...DEFAULT_SESSION_PROPERTIES, earlyReturnEnabled: false });
  });

  it('prefers a file over inline json', async () => {
    const file = join(dir, 'cardinal.json');
    await writeFile(file, JSON.stringify({ executorConcurrency: 3, session: { indexThreshold: 0.5 } }));

    const config = await loadConfig({ file, json: { executorConcurrency: 8 } });

    expect(config.executorConcurrency).toBe(3);
    expect(config.session.indexThreshold).toBe(0.5);
  });

  it('reports a missing file', async () => {
    const file = join(dir, 'missing.json');

    const error = await loadConfig({ file }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toHaveProperty('message', expect.stringContaining(`Failed to load config from ${file}:`));
  });

  it('reports unparseable json', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ not json');

    await expect(loadConfig({ file })).rejects.toBeInstanceOf(ConfigError);
  });
});

describe('resolveConfig', () => {
  it('rejects non-objects', () => {
    expect(() => resolveConfig([])).toThrow('Invalid config: expected an object');
  });

  it('rejects a zero concurrency', () => {
    expect(() => resolveConfig({ executorConcurrency: 0 })).toThrow(
      'Invalid config: executorConcurrency must be an integer >= 1'
    );
  });

  it('rejects a fractional cache size', () => {
    expect(() => resolveConfig({ cardinalityCacheSize: 1.5 })).toThrow(ConfigError);
  });
});

describe('resolveSession', () => {
  it('fills gaps from the base properties', () => {
    const base = { ...DEFAULT_SESSION_PROPERTIES, pollingIntervalMs: 50 };

    expect(resolveSession({ indexThreshold: 0.3 }, base)).toEqual({ ...base, indexThreshold: 0.3 });
    expect(resolveSession(undefined, base)).toEqual(base);
  });

  it('rejects ratios outside [0, 1]', () => {
    expect(() => resolveSession({ lowestCardinalityThreshold: 1.5 })).toThrow(
      'Invalid config: lowestCardinalityThreshold must be a number between 0 and 1'
    );
  });

  it('rejects non-boolean flags', () => {
    expect(() => resolveSession({ earlyReturnEnabled: 'yes' })).toThrow(
      'Invalid config: earlyReturnEnabled must be a boolean'
    );
  });

  it('rejects a non-object session', () => {
    expect(() => resolveConfig({ session: 5 })).toThrow('Invalid config: session must be an object');
  });
});
