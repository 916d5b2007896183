import { readFile } from 'fs/promises';
import { ConfigError } from '@cardinal/core';
import { defaultConcurrency } from './executor';

export interface SessionProperties {
  /** Short-circuit the cardinality fetch once a small enough column is known */
  earlyReturnEnabled: boolean;
  pollingIntervalMs: number;
  /** Fraction of the table's rows at or below which a column short-circuits the fetch */
  lowestCardinalityThreshold: number;
  /** Largest fraction of the table's rows an index scan may match before a full scan wins */
  indexThreshold: number;
}

export interface CardinalityConfig {
  cardinalityCacheSize: number;
  cardinalityCacheExpirationMs: number;
  executorConcurrency: number;
  session: SessionProperties;
}

export type CardinalityConfigInput = Partial<Omit<CardinalityConfig, 'session'>> & {
  session?: Partial<SessionProperties>;
};

export interface ConfigSource {
  file?: string;
  json?: CardinalityConfigInput;
}

export const DEFAULT_SESSION_PROPERTIES: SessionProperties = {
  earlyReturnEnabled: true,
  pollingIntervalMs: 10,
  lowestCardinalityThreshold: 0.01,
  indexThreshold: 0.2,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInteger(source: Record<string, unknown>, field: string, fallback: number, min: number): number {
  const value = source[field];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    throw new ConfigError(`Invalid config: ${field} must be an integer >= ${min}`);
  }
  return value;
}

function readRatio(source: Record<string, unknown>, field: string, fallback: number): number {
  const value = source[field];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || Number.isNaN(value) || value < 0 || value > 1) {
    throw new ConfigError(`Invalid config: ${field} must be a number between 0 and 1`);
  }
  return value;
}

function readBoolean(source: Record<string, unknown>, field: string, fallback: boolean): boolean {
  const value = source[field];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'boolean') {
    throw new ConfigError(`Invalid config: ${field} must be a boolean`);
  }
  return value;
}

/**
 * Validate session properties, filling gaps from `base`
 */
export function resolveSession(input: unknown, base: SessionProperties = DEFAULT_SESSION_PROPERTIES): SessionProperties {
  if (input === undefined) {
    return { ...base };
  }
  if (!isRecord(input)) {
    throw new ConfigError('Invalid config: session must be an object');
  }
  return {
    earlyReturnEnabled: readBoolean(input, 'earlyReturnEnabled', base.earlyReturnEnabled),
    pollingIntervalMs: readInteger(input, 'pollingIntervalMs', base.pollingIntervalMs, 0),
    lowestCardinalityThreshold: readRatio(input, 'lowestCardinalityThreshold', base.lowestCardinalityThreshold),
    indexThreshold: readRatio(input, 'indexThreshold', base.indexThreshold),
  };
}

/**
 * Validate a raw configuration object and apply defaults
 */
export function resolveConfig(input: unknown): CardinalityConfig {
  if (!isRecord(input)) {
    throw new ConfigError('Invalid config: expected an object');
  }
  return {
    cardinalityCacheSize: readInteger(input, 'cardinalityCacheSize', 100000, 0),
    cardinalityCacheExpirationMs: readInteger(input, 'cardinalityCacheExpirationMs', 300000, 0),
    executorConcurrency: readInteger(input, 'executorConcurrency', defaultConcurrency(), 1),
    session: resolveSession(input.session),
  };
}

/**
 * Load and validate configuration
 * Priority: file > json > defaults
 */
export async function loadConfig(source: ConfigSource = {}): Promise<CardinalityConfig> {
  let raw: unknown;

  // Priority 1: Load from file
  if (source.file) {
    try {
      const content = await readFile(source.file, 'utf-8');
      raw = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Failed to load config from ${source.file}: ${reason}`, { cause: error });
    }
  }
  // Priority 2: Use inline JSON
  else if (source.json) {
    raw = source.json;
  }
  // Nothing given: defaults only
  else {
    raw = {};
  }

  return resolveConfig(raw);
}
