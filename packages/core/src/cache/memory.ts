import type { Cache } from './types';

export interface MemoryLRUConfig {
  maxEntries?: number; // Default: 100,000
  maxAgeMs?: number; // Default: 300,000 (5 minutes), measured from the last write
  enableBackgroundCleanup?: boolean; // Default: true
  cleanupIntervalMs?: number; // Default: 60,000 (1 minute)
}

export interface MemoryLRUStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
}

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

/**
 * In-memory LRU cache bounded by entry count and age since write
 * Uses Map insertion order to optimize LRU eviction (O(1) instead of O(n))
 */
export class MemoryLRU<V> implements Cache<V> {
  private cache: Map<string, CacheEntry<V>>;
  private readonly maxEntries: number;
  private readonly maxAgeMs: number;
  private cleanupTimer?: NodeJS.Timeout;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: MemoryLRUConfig = {}) {
    this.cache = new Map();
    this.maxEntries = config.maxEntries ?? 100000;
    this.maxAgeMs = config.maxAgeMs ?? 300000;

    const enableCleanup = config.enableBackgroundCleanup ?? true;
    if (enableCleanup) {
      const interval = config.cleanupIntervalMs ?? 60000;
      this.cleanupTimer = setInterval(() => this.pruneExpired(), interval);
      // Allow process to exit even if timer is active
      this.cleanupTimer.unref?.();
    }
  }

  async get(key: string): Promise<V | undefined> {
    const entry = this.cache.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (Date.now() >= entry.expiresAt) {
      this.cache.delete(key);
      this.evictions++;
      this.misses++;
      return undefined;
    }

    // Move to end (most recent); expiry stays tied to the write
    this.cache.delete(key);
    this.cache.set(key, entry);
    this.hits++;
    return entry.value;
  }

  /**
   * Store a value. A ttlMs of 0 falls back to the configured max age,
   * and no entry outlives the max age.
   */
  async set(key: string, value: V, ttlMs = 0): Promise<void> {
    const ttl = ttlMs > 0 ? Math.min(ttlMs, this.maxAgeMs) : this.maxAgeMs;

    this.cache.delete(key);
    while (this.cache.size >= this.maxEntries && this.cache.size > 0) {
      this.evictOldest();
    }
    if (this.maxEntries <= 0) {
      return;
    }

    this.cache.set(key, { value, expiresAt: Date.now() + ttl });
  }

  async del(key: string): Promise<void> {
    this.cache.delete(key);
  }

  /**
   * Remove expired entries
   */
  pruneExpired(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache.entries()) {
      if (now >= entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }

    this.evictions += removed;
    return removed;
  }

  /**
   * Evict the least recently used entry
   * Map maintains insertion order, so first entry is the oldest
   */
  private evictOldest(): void {
    const firstKey = this.cache.keys().next().value;
    if (firstKey !== undefined) {
      this.cache.delete(firstKey);
      this.evictions++;
    }
  }

  async clear(): Promise<void> {
    this.cache.clear();
  }

  size(): number {
    return this.cache.size;
  }

  stats(): MemoryLRUStats {
    return {
      size: this.cache.size,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  /**
   * Cleanup resources
   */
  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.cache.clear();
  }
}
