import type { Redis } from 'ioredis';
import { CardinalError, StoreUnavailableError, TableExistsError, TableNotFoundError } from '../errors';
import type { Logger } from '../logger';
import { consoleLogger } from '../logger';
import { parseVisibility, isVisible } from '../visibility';
import { CacheKey, exactValue, groupByCounters, qualifiedName, rangeContains, type TableRef } from '../types';
import type { CardinalityStore, CardinalityWriter } from './types';

/**
 * Queued MULTI block; `exec` resolves to one `[error, reply]` pair per
 * command, or null when the transaction was discarded.
 */
export interface CounterTransaction {
  hincrby(key: string, field: string, increment: number): CounterTransaction;
  exec(): Promise<Array<[Error | null, unknown]> | null>;
}

/**
 * The subset of ioredis commands the store issues. An ioredis `Redis`
 * (or `Cluster`) instance satisfies it.
 */
export interface CounterClient {
  multi(): CounterTransaction;
  exists(...keys: string[]): Promise<number>;
  del(...keys: string[]): Promise<number>;
  rename(key: string, newKey: string): Promise<unknown>;
  hincrby(key: string, field: string, increment: number): Promise<number>;
  hget(key: string, field: string): Promise<string | null>;
  hgetall(key: string): Promise<Record<string, string>>;
  hkeys(key: string): Promise<string[]>;
}

export interface RedisCardinalityStoreConfig {
  client: CounterClient | Redis;
  prefix?: string; // Default: "card:"
  logger?: Logger; // Default: consoleLogger
}

const ROWS_FIELD = 'rows';

/**
 * Redis-based counter store
 *
 * Layout for table `schema.table` under prefix `p`:
 * - `p{schema.table}:meta`          hash, field `rows` = row count (existence marks the table)
 * - `p{schema.table}:families`      hash, family -> increments
 * - `p{schema.table}:f:<family>`    hash, value -> increments (index for range reads)
 * - `p{schema.table}:f:<family>:v:<value>`  hash, visibility -> count
 *
 * Client failures are wrapped in StoreUnavailableError.
 */
export class RedisCardinalityStore implements CardinalityStore {
  private readonly client: CounterClient;
  private readonly prefix: string;
  private readonly logger: Logger;

  constructor(config: RedisCardinalityStoreConfig) {
    this.client = config.client;
    this.prefix = config.prefix ?? 'card:';
    this.logger = config.logger ?? consoleLogger;
  }

  async createTable(table: TableRef): Promise<void> {
    // HINCRBY by 0 creates the meta hash without touching an existing count
    await this.call('createTable', () => this.client.hincrby(this.metaKey(table), ROWS_FIELD, 0));
  }

  async dropTable(table: TableRef): Promise<void> {
    const keys = await this.call('dropTable', () => this.tableKeys(table));
    if (keys.length > 0) {
      await this.call('dropTable', () => this.client.del(...keys));
    }
  }

  async renameTable(from: TableRef, to: TableRef): Promise<void> {
    await this.requireTable(from);
    if (await this.tableExists(to)) {
      throw new TableExistsError(qualifiedName(to));
    }

    const sourcePrefix = this.tablePrefix(from);
    const targetPrefix = this.tablePrefix(to);
    const keys = await this.call('renameTable', () => this.tableKeys(from));
    await this.call('renameTable', () =>
      Promise.all(keys.map((key) => this.client.rename(key, targetPrefix + key.slice(sourcePrefix.length))))
    );
  }

  async tableExists(table: TableRef): Promise<boolean> {
    const count = await this.call('tableExists', () => this.client.exists(this.metaKey(table)));
    return count > 0;
  }

  newWriter(table: TableRef): CardinalityWriter {
    return new RedisCardinalityWriter(this, table);
  }

  async getCardinality(key: CacheKey | readonly CacheKey[]): Promise<number> {
    const keys = key instanceof CacheKey ? [key] : key;
    await this.requireTables(keys);
    const counts = await Promise.all(groupByCounters(keys).map((group) => this.count(group)));
    return counts.reduce((sum, count) => sum + count, 0);
  }

  async getCardinalities(keys: readonly CacheKey[]): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    const unique = new Map<string, CacheKey>();
    for (const key of keys) {
      unique.set(key.id, key);
    }

    await this.requireTables(Array.from(unique.values()));
    await Promise.all(
      Array.from(unique.values()).map(async (key) => {
        result.set(key.id, await this.count([key]));
      })
    );
    return result;
  }

  async getNumRowsInTable(schema: string, table: string): Promise<number> {
    const ref = { schema, table };
    const rows = await this.call('getNumRowsInTable', () => this.client.hget(this.metaKey(ref), ROWS_FIELD));
    if (rows === null) {
      throw new TableNotFoundError(qualifiedName(ref));
    }
    return Number(rows);
  }

  /**
   * @internal called by writers on flush
   */
  async apply(table: TableRef, increments: ReadonlyMap<string, PendingIncrement>, rows: number): Promise<void> {
    await this.requireTable(table);

    const transaction = this.client.multi();
    const families = new Map<string, number>();
    const values = new Map<string, number>();

    for (const { value, family, visibility, count } of increments.values()) {
      families.set(family, (families.get(family) ?? 0) + count);
      const indexField = JSON.stringify([family, value]);
      values.set(indexField, (values.get(indexField) ?? 0) + count);
      transaction.hincrby(this.valueKey(table, family, value), visibility, count);
    }
    for (const [indexField, count] of values) {
      const [family, value] = parseIndexField(indexField);
      transaction.hincrby(this.familyKey(table, family), value, count);
    }
    for (const [family, count] of families) {
      transaction.hincrby(this.familiesKey(table), family, count);
    }
    if (rows > 0) {
      transaction.hincrby(this.metaKey(table), ROWS_FIELD, rows);
    }

    await this.call('flush', async () => {
      const replies = await transaction.exec();
      if (replies === null) {
        throw new Error('MULTI transaction discarded');
      }
      const failed = replies.find(([error]) => error !== null);
      if (failed?.[0]) {
        throw failed[0];
      }
    });
  }

  /**
   * Visible count of every value any of the keys covers. Keys share table,
   * family and authorizations; exact-only groups skip the index scan.
   */
  private async count(keys: readonly CacheKey[]): Promise<number> {
    const { family, auths } = keys[0];
    const exact = new Set<string>();
    for (const key of keys) {
      const value = exactValue(key.range);
      if (value !== undefined) {
        exact.add(value);
      }
    }
    const values =
      exact.size === keys.length
        ? Array.from(exact)
        : (await this.call('getCardinality', () => this.client.hkeys(this.familyKey(keys[0], family)))).filter((value) =>
            keys.some((key) => rangeContains(key.range, value))
          );

    const counts = await this.call('getCardinality', () =>
      Promise.all(values.map((value) => this.client.hgetall(this.valueKey(keys[0], family, value))))
    );

    let sum = 0;
    for (const labels of counts) {
      for (const [visibility, count] of Object.entries(labels)) {
        if (isVisible(visibility, auths)) {
          sum += Number(count);
        }
      }
    }
    return sum;
  }

  private async requireTables(keys: readonly CacheKey[]): Promise<void> {
    const tables = new Map<string, TableRef>();
    for (const key of keys) {
      tables.set(qualifiedName(key), { schema: key.schema, table: key.table });
    }
    await Promise.all(Array.from(tables.values()).map((table) => this.requireTable(table)));
  }

  private async requireTable(table: TableRef): Promise<void> {
    if (!(await this.tableExists(table))) {
      throw new TableNotFoundError(qualifiedName(table));
    }
  }

  private async tableKeys(table: TableRef): Promise<string[]> {
    const keys = [this.metaKey(table), this.familiesKey(table)];
    for (const family of await this.client.hkeys(this.familiesKey(table))) {
      keys.push(this.familyKey(table, family));
      for (const value of await this.client.hkeys(this.familyKey(table, family))) {
        keys.push(this.valueKey(table, family, value));
      }
    }
    return keys;
  }

  private async call<T>(operation: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      if (error instanceof CardinalError) {
        throw error;
      }
      this.logger.error(`RedisCardinalityStore.${operation} failed:`, error);
      throw new StoreUnavailableError(`Redis ${operation} failed`, { cause: error });
    }
  }

  private tablePrefix(table: TableRef): string {
    return `${this.prefix}{${encodeURIComponent(table.schema)}.${encodeURIComponent(table.table)}}`;
  }

  private metaKey(table: TableRef): string {
    return `${this.tablePrefix(table)}:meta`;
  }

  private familiesKey(table: TableRef): string {
    return `${this.tablePrefix(table)}:families`;
  }

  private familyKey(table: TableRef, family: string): string {
    return `${this.tablePrefix(table)}:f:${encodeURIComponent(family)}`;
  }

  private valueKey(table: TableRef, family: string, value: string): string {
    return `${this.familyKey(table, family)}:v:${encodeURIComponent(value)}`;
  }
}

interface PendingIncrement {
  value: string;
  family: string;
  visibility: string;
  count: number;
}

function parseIndexField(field: string): [string, string] {
  const parsed: unknown = JSON.parse(field);
  if (Array.isArray(parsed) && typeof parsed[0] === 'string' && typeof parsed[1] === 'string') {
    return [parsed[0], parsed[1]];
  }
  throw new Error(`Malformed index field ${field}`);
}

class RedisCardinalityWriter implements CardinalityWriter {
  // Increments are coalesced per (family, value, visibility) until flush
  private pending = new Map<string, PendingIncrement>();
  private pendingRows = 0;

  constructor(
    private readonly store: RedisCardinalityStore,
    private readonly table: TableRef
  ) {}

  incrementCardinality(value: string, family: string, visibility = ''): void {
    parseVisibility(visibility);
    const id = JSON.stringify([family, value, visibility]);
    const entry = this.pending.get(id);
    if (entry) {
      entry.count++;
    } else {
      this.pending.set(id, { value, family, visibility, count: 1 });
    }
  }

  incrementRowCount(): void {
    this.pendingRows++;
  }

  async flush(): Promise<void> {
    const increments = this.pending;
    const rows = this.pendingRows;
    this.pending = new Map();
    this.pendingRows = 0;
    if (increments.size === 0 && rows === 0) {
      return;
    }
    try {
      await this.store.apply(this.table, increments, rows);
    } catch (error) {
      // Merge the batch back for the next flush
      for (const [id, entry] of increments) {
        const current = this.pending.get(id);
        if (current) {
          current.count += entry.count;
        } else {
          this.pending.set(id, entry);
        }
      }
      this.pendingRows += rows;
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }
}
