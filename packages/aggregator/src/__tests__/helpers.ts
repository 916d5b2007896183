import { CacheKey, MemoryCardinalityStore, type Logger, type TableRef } from '@cardinal/core';

export class Deferred<T = void> {
  readonly promise: Promise<T>;
  resolve: (value: T) => void = () => {};
  reject: (reason: unknown) => void = () => {};

  constructor() {
    this.promise = new Promise<T>((resolve, reject) => {
      this.resolve = resolve;
      this.reject = reject;
    });
  }
}

export const TABLE: TableRef = { schema: 'default', table: 'people' };

/**
 * Memory store that records every read and can hold or fail reads per family
 */
export class ControlledStore extends MemoryCardinalityStore {
  readonly singleReads: CacheKey[] = [];
  readonly rangeReads: CacheKey[][] = [];
  readonly batchReads: CacheKey[][] = [];
  active = 0;
  maxActive = 0;
  private readonly gates = new Map<string, Deferred>();
  private readonly failures = new Map<string, Error>();

  hold(family: string): void {
    this.gates.set(family, new Deferred());
  }

  release(family: string): void {
    this.gates.get(family)?.resolve();
    this.gates.delete(family);
  }

  fail(family: string, error: Error): void {
    this.failures.set(family, error);
  }

  override async getCardinality(key: CacheKey | readonly CacheKey[]): Promise<number> {
    const keys = key instanceof CacheKey ? [key] : key;
    if (key instanceof CacheKey) {
      this.singleReads.push(key);
    } else {
      this.rangeReads.push([...key]);
    }
    return this.guarded(keys, () => super.getCardinality(key));
  }

  override async getCardinalities(keys: readonly CacheKey[]): Promise<Map<string, number>> {
    this.batchReads.push([...keys]);
    return this.guarded(keys, () => super.getCardinalities(keys));
  }

  private async guarded<T>(keys: readonly CacheKey[], read: () => Promise<T>): Promise<T> {
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      for (const key of keys) {
        await this.gates.get(key.family)?.promise;
        const failure = this.failures.get(key.family);
        if (failure) {
          throw failure;
        }
      }
      return await read();
    } finally {
      this.active--;
    }
  }
}

/**
 * Write `count` unlabelled increments of each value under `family`
 */
export async function seed(store: MemoryCardinalityStore, family: string, counts: Record<string, number>): Promise<void> {
  await store.createTable(TABLE);
  const writer = store.newWriter(TABLE);
  for (const [value, count] of Object.entries(counts)) {
    for (let i = 0; i < count; i++) {
      writer.incrementCardinality(value, family);
    }
  }
  await writer.flush();
}

export function recordingLogger(): Logger & { warnings: unknown[][] } {
  const warnings: unknown[][] = [];
  return {
    warnings,
    warn: (message: string, ...args: unknown[]) => {
      warnings.push([message, ...args]);
    },
    error: () => {},
  };
}
