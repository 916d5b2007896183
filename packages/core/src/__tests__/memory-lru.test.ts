import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { MemoryLRU } from '../cache/memory';

describe('MemoryLRU', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns stored values until they age out', async () => {
    const cache = new MemoryLRU<number>({ maxAgeMs: 1000, enableBackgroundCleanup: false });
    await cache.set('a', 1);

    vi.advanceTimersByTime(999);
    expect(await cache.get('a')).toBe(1);

    vi.advanceTimersByTime(1);
    expect(await cache.get('a')).toBeUndefined();
    expect(cache.size()).toBe(0);
  });

  it('measures age from the write, not the last read', async () => {
    const cache = new MemoryLRU<number>({ maxAgeMs: 1000, enableBackgroundCleanup: false });
    await cache.set('a', 1);

    vi.advanceTimersByTime(600);
    expect(await cache.get('a')).toBe(1);
    vi.advanceTimersByTime(600);
    expect(await cache.get('a')).toBeUndefined();
  });

  it('never lets a per-entry ttl exceed the max age', async () => {
    const cache = new MemoryLRU<number>({ maxAgeMs: 1000, enableBackgroundCleanup: false });
    await cache.set('a', 1, 60000);

    vi.advanceTimersByTime(1000);
    expect(await cache.get('a')).toBeUndefined();
  });

  it('evicts the least recently used entry at capacity', async () => {
    const cache = new MemoryLRU<number>({ maxEntries: 2, enableBackgroundCleanup: false });
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.get('a');
    await cache.set('c', 3);

    expect(await cache.get('a')).toBe(1);
    expect(await cache.get('b')).toBeUndefined();
    expect(await cache.get('c')).toBe(3);
    expect(cache.stats()).toEqual({ size: 2, hits: 3, misses: 1, evictions: 1 });
  });

  it('overwrites without evicting others', async () => {
    const cache = new MemoryLRU<number>({ maxEntries: 2, enableBackgroundCleanup: false });
    await cache.set('a', 1);
    await cache.set('b', 2);
    await cache.set('a', 10);

    expect(await cache.get('a')).toBe(10);
    expect(await cache.get('b')).toBe(2);
  });

  it('prunes expired entries in the background', async () => {
    const cache = new MemoryLRU<number>({ maxAgeMs: 1000, cleanupIntervalMs: 500 });
    await cache.set('a', 1);

    vi.advanceTimersByTime(1000);
    expect(cache.size()).toBe(0);
    cache.destroy();
  });
});
