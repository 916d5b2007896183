/**
 * @cardinal/core
 *
 * Cardinal Core Package
 * Provides the value-range model, counter stores and cache adapters
 */

// Types
export * from './types';
export * from './errors';
export * from './visibility';
export * from './cache/types';
export * from './store/types';
export * from './logger';

// Cache implementations
export { MemoryLRU } from './cache/memory';
export type { MemoryLRUConfig, MemoryLRUStats } from './cache/memory';

// Counter stores
export { MemoryCardinalityStore } from './store/memory';
export { RedisCardinalityStore } from './store/redis';
export type { RedisCardinalityStoreConfig, CounterClient, CounterTransaction } from './store/redis';
