import {
  MemoryLRU,
  consoleLogger,
  scopedLogger,
  type Cache,
  type CacheKey,
  type CardinalityStore,
  type Logger,
} from '@cardinal/core';

export interface CardinalityCacheConfig {
  store: CardinalityStore;
  maxEntries?: number; // Default: 100,000
  maxAgeMs?: number; // Default: 300,000 (5 minutes)
  cache?: Cache<number>; // Default: MemoryLRU sized by maxEntries/maxAgeMs; a supplied cache is not destroyed
  logger?: Logger;
}

/**
 * Memoizes exact (single-value) cardinality lookups in front of one store.
 *
 * The store is bound at construction; a cache never serves two stores.
 * Concurrent lookups of the same missing key share a single load, and a
 * failed load leaves nothing behind.
 */
export class MemoizedCardinalityCache {
  private readonly store: CardinalityStore;
  private readonly cache: Cache<number>;
  private readonly ownsCache: boolean;
  private readonly maxAgeMs: number;
  private readonly logger: Logger;
  private readonly inflight = new Map<string, Promise<number>>();
  private loads = 0;
  // Bumped by invalidateAll; loads started under an older generation are not stored
  private generation = 0;

  constructor(config: CardinalityCacheConfig) {
    const maxEntries = config.maxEntries ?? 100000;
    this.store = config.store;
    this.maxAgeMs = config.maxAgeMs ?? 300000;
    this.ownsCache = config.cache === undefined;
    this.cache = config.cache ?? new MemoryLRU<number>({ maxEntries, maxAgeMs: this.maxAgeMs });
    this.logger = scopedLogger(config.logger ?? consoleLogger, 'cardinality-cache');
    this.logger.debug?.(`Created new cache size ${maxEntries} expiry ${this.maxAgeMs}ms`);
  }

  async get(key: CacheKey): Promise<number> {
    const pending = this.inflight.get(key.id);
    if (pending) {
      return pending;
    }

    const cached = await this.cache.get(key.id);
    if (cached !== undefined) {
      return cached;
    }

    // Re-check: another caller may have started the load while we awaited the cache
    return this.inflight.get(key.id) ?? this.singleflight(key.id, () => this.store.getCardinality(key));
  }

  /**
   * Resolve every key, loading all misses in one batched store call.
   * Keys already being loaded join that load.
   */
  async getAll(keys: readonly CacheKey[]): Promise<Map<string, number>> {
    const unique = new Map<string, CacheKey>();
    for (const key of keys) {
      unique.set(key.id, key);
    }

    const ids = Array.from(unique.keys());
    const cached = await Promise.all(ids.map((id) => this.cache.get(id)));

    const result = new Map<string, number>();
    const waiting: Array<Promise<void>> = [];
    const missing: CacheKey[] = [];

    ids.forEach((id, i) => {
      const value = cached[i];
      if (value !== undefined) {
        result.set(id, value);
        return;
      }
      const pending = this.inflight.get(id);
      if (pending) {
        waiting.push(pending.then((count) => void result.set(id, count)));
        return;
      }
      const key = unique.get(id);
      if (key) {
        missing.push(key);
      }
    });

    if (missing.length > 0) {
      const batch = Promise.resolve().then(() => this.store.getCardinalities(missing));
      for (const key of missing) {
        const load = this.singleflight(key.id, async () => (await batch).get(key.id) ?? 0);
        waiting.push(load.then((count) => void result.set(key.id, count)));
      }
    }

    await Promise.all(waiting);
    return result;
  }

  /**
   * Drop every cached count. Loads still in flight finish for their callers
   * but are not stored.
   */
  async invalidateAll(): Promise<void> {
    this.generation++;
    this.inflight.clear();
    await this.cache.clear?.();
  }

  stats(): { size: number; loads: number; inflight: number } {
    return {
      size: this.cache.size?.() ?? 0,
      loads: this.loads,
      inflight: this.inflight.size,
    };
  }

  destroy(): void {
    if (this.ownsCache) {
      this.cache.destroy?.();
    }
  }

  private singleflight(id: string, load: () => Promise<number>): Promise<number> {
    this.loads++;
    const generation = this.generation;
    const promise = Promise.resolve()
      .then(load)
      .then(async (count) => {
        if (generation === this.generation) {
          await this.cache.set(id, count, this.maxAgeMs);
        }
        return count;
      });

    this.inflight.set(id, promise);
    const clear = (): void => {
      if (this.inflight.get(id) === promise) {
        this.inflight.delete(id);
      }
    };
    promise.then(clear, clear);
    return promise;
  }
}
