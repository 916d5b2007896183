import type { CacheKey, TableRef } from '../types';

/**
 * Buffered writer for one counter table.
 * Increments are invisible to readers until flush() resolves.
 */
export interface CardinalityWriter {
  /**
   * Buffer a +1 for `value` under `family`, visible to readers whose
   * authorizations satisfy `visibility` (empty: visible to everyone)
   */
  incrementCardinality(value: string, family: string, visibility?: string): void;

  /**
   * Buffer a +1 on the table's row counter
   */
  incrementRowCount(): void;

  flush(): Promise<void>;

  /**
   * Flush and release the writer
   */
  close(): Promise<void>;
}

/**
 * Durable, authorization-aware counter storage
 */
export interface CardinalityStore {
  /**
   * Create the counter table. Creating an existing table is a no-op.
   */
  createTable(table: TableRef): Promise<void>;

  /**
   * Drop the counter table. Dropping a missing table is a no-op.
   */
  dropTable(table: TableRef): Promise<void>;

  /**
   * @throws TableNotFoundError if `from` does not exist
   * @throws TableExistsError if `to` already exists
   */
  renameTable(from: TableRef, to: TableRef): Promise<void>;

  tableExists(table: TableRef): Promise<boolean>;

  newWriter(table: TableRef): CardinalityWriter;

  /**
   * Sum of visible counts for the key's family and range; for an array of
   * keys, the sum over all of them (0 for an empty array).
   * @throws TableNotFoundError if the counter table does not exist
   */
  getCardinality(key: CacheKey | readonly CacheKey[]): Promise<number>;

  /**
   * Batched lookup returning one entry per distinct key id, 0 for values
   * never incremented.
   * @throws TableNotFoundError if the counter table does not exist
   */
  getCardinalities(keys: readonly CacheKey[]): Promise<Map<string, number>>;

  getNumRowsInTable(schema: string, table: string): Promise<number>;
}
