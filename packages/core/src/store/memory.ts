import { TableExistsError, TableNotFoundError } from '../errors';
import { parseVisibility, isVisible } from '../visibility';
import { CacheKey, groupByCounters, qualifiedName, rangeContains, type TableRef } from '../types';
import type { CardinalityStore, CardinalityWriter } from './types';

// family -> value -> visibility -> count
type FamilyCounters = Map<string, Map<string, number>>;

interface TableCounters {
  rows: number;
  families: Map<string, FamilyCounters>;
}

interface PendingIncrement {
  value: string;
  family: string;
  visibility: string;
}

class MemoryCardinalityWriter implements CardinalityWriter {
  private pending: PendingIncrement[] = [];
  private pendingRows = 0;

  constructor(
    private readonly store: MemoryCardinalityStore,
    private readonly table: TableRef
  ) {}

  incrementCardinality(value: string, family: string, visibility = ''): void {
    parseVisibility(visibility);
    this.pending.push({ value, family, visibility });
  }

  incrementRowCount(): void {
    this.pendingRows++;
  }

  async flush(): Promise<void> {
    const increments = this.pending;
    const rows = this.pendingRows;
    this.pending = [];
    this.pendingRows = 0;
    try {
      this.store.apply(this.table, increments, rows);
    } catch (error) {
      // Keep the batch for the next flush
      this.pending = [...increments, ...this.pending];
      this.pendingRows += rows;
      throw error;
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }
}

/**
 * In-process counter store
 *
 * Holds every counter in nested maps. Useful for tests, examples and
 * single-process deployments where counters need not survive a restart.
 */
export class MemoryCardinalityStore implements CardinalityStore {
  private readonly tables = new Map<string, TableCounters>();

  async createTable(table: TableRef): Promise<void> {
    const name = qualifiedName(table);
    if (!this.tables.has(name)) {
      this.tables.set(name, { rows: 0, families: new Map() });
    }
  }

  async dropTable(table: TableRef): Promise<void> {
    this.tables.delete(qualifiedName(table));
  }

  async renameTable(from: TableRef, to: TableRef): Promise<void> {
    const source = this.requireTable(qualifiedName(from));
    const target = qualifiedName(to);
    if (this.tables.has(target)) {
      throw new TableExistsError(target);
    }
    this.tables.delete(qualifiedName(from));
    this.tables.set(target, source);
  }

  async tableExists(table: TableRef): Promise<boolean> {
    return this.tables.has(qualifiedName(table));
  }

  newWriter(table: TableRef): CardinalityWriter {
    return new MemoryCardinalityWriter(this, table);
  }

  async getCardinality(key: CacheKey | readonly CacheKey[]): Promise<number> {
    const keys = key instanceof CacheKey ? [key] : key;
    let sum = 0;
    for (const group of groupByCounters(keys)) {
      sum += this.count(group);
    }
    return sum;
  }

  async getCardinalities(keys: readonly CacheKey[]): Promise<Map<string, number>> {
    const result = new Map<string, number>();
    for (const key of keys) {
      result.set(key.id, this.count([key]));
    }
    return result;
  }

  async getNumRowsInTable(schema: string, table: string): Promise<number> {
    return this.requireTable(qualifiedName({ schema, table })).rows;
  }

  /**
   * @internal called by writers on flush
   */
  apply(table: TableRef, increments: readonly PendingIncrement[], rows: number): void {
    const counters = this.requireTable(qualifiedName(table));
    counters.rows += rows;

    for (const { value, family, visibility } of increments) {
      let values = counters.families.get(family);
      if (!values) {
        values = new Map();
        counters.families.set(family, values);
      }
      let labels = values.get(value);
      if (!labels) {
        labels = new Map();
        values.set(value, labels);
      }
      labels.set(visibility, (labels.get(visibility) ?? 0) + 1);
    }
  }

  /**
   * Visible count of every value any of the keys covers. Keys share table,
   * family and authorizations.
   */
  private count(keys: readonly CacheKey[]): number {
    const { family, auths } = keys[0];
    const counters = this.requireTable(qualifiedName(keys[0]));
    const values = counters.families.get(family);
    if (!values) {
      return 0;
    }

    let sum = 0;
    for (const [value, labels] of values) {
      if (!keys.some((key) => rangeContains(key.range, value))) {
        continue;
      }
      for (const [visibility, count] of labels) {
        if (isVisible(visibility, auths)) {
          sum += count;
        }
      }
    }
    return sum;
  }

  private requireTable(name: string): TableCounters {
    const counters = this.tables.get(name);
    if (!counters) {
      throw new TableNotFoundError(name);
    }
    return counters;
  }
}
