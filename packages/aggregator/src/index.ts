/**
 * @cardinal/aggregator
 *
 * Bounded fan-out of cardinality lookups, memoization and index selection
 */

// Core aggregation
export { CardinalityAggregator } from './aggregator';
export type { CardinalityAggregatorConfig } from './aggregator';
export { ProbeSpec, RankedResult } from './types';
export type { ProbeSpecInit, CardinalityRequest } from './types';

// Building blocks
export { BoundedExecutor, defaultConcurrency } from './executor';
export type { BoundedExecutorConfig } from './executor';
export { MemoizedCardinalityCache } from './cardinality-cache';
export type { CardinalityCacheConfig } from './cardinality-cache';

// Index selection
export { IndexSelector } from './index-selector';
export type { IndexSelectorOptions, IndexSelectionRequest, IndexSelection } from './index-selector';

// Configuration
export { loadConfig, resolveConfig, resolveSession, DEFAULT_SESSION_PROPERTIES } from './config';
export type { CardinalityConfig, CardinalityConfigInput, ConfigSource, SessionProperties } from './config';
