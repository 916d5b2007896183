import { setTimeout as sleep } from 'timers/promises';
import {
  CacheKey,
  CardinalityLookupError,
  InterruptedError,
  TableNotFoundError,
  consoleLogger,
  isExactRange,
  scopedLogger,
  type Cache,
  type CardinalityStore,
  type Logger,
  type ValueRange,
} from '@cardinal/core';
import { MemoizedCardinalityCache } from './cardinality-cache';
import type { CardinalityConfig } from './config';
import { BoundedExecutor } from './executor';
import { RankedResult, type CardinalityRequest, type ProbeSpec } from './types';

export interface CardinalityAggregatorConfig {
  store: CardinalityStore;
  cacheMaxEntries?: number; // Default: 100,000
  cacheMaxAgeMs?: number; // Default: 300,000 (5 minutes)
  concurrency?: number; // Default: 4 x available parallelism; ignored when executor is given
  executor?: BoundedExecutor; // Shared executor; not shut down by this aggregator
  cache?: Cache<number>; // Supplied caches outlive shutdown()
  logger?: Logger;
}

interface ColumnCardinality {
  probe: ProbeSpec;
  cardinality: number;
}

/**
 * Collects settled column tasks until the caller drains them. Once the
 * caller stops listening, late outcomes go to the detach handler instead.
 */
class CompletionQueue<T> {
  private completed: Array<PromiseSettledResult<T>> = [];
  private waiter?: () => void;
  private detached?: (outcome: PromiseSettledResult<T>) => void;

  add(task: Promise<T>): void {
    task.then(
      (value) => this.settle({ status: 'fulfilled', value }),
      (reason: unknown) => this.settle({ status: 'rejected', reason })
    );
  }

  drain(): Array<PromiseSettledResult<T>> {
    return this.completed.splice(0);
  }

  /**
   * Resolves once at least one outcome is waiting to be drained
   */
  next(): Promise<void> {
    if (this.completed.length > 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  detach(handler: (outcome: PromiseSettledResult<T>) => void): void {
    this.detached = handler;
    this.waiter = undefined;
  }

  private settle(outcome: PromiseSettledResult<T>): void {
    if (this.detached) {
      this.detached(outcome);
      return;
    }
    this.completed.push(outcome);
    this.waiter?.();
    this.waiter = undefined;
  }
}

function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Resolves the cardinality of every candidate index column and ranks them.
 *
 * Each probe becomes one column task on the bounded executor, fanned out
 * into one task per column family on the same executor. Exact ranges go
 * through the memoized cache, everything else straight to the store.
 *
 * With early return enabled the caller polls every `pollingIntervalMs` and
 * gets a partial ranking as soon as the smallest cardinality seen is at or
 * below the threshold. Columns still running finish in the background: they
 * fill the cache and their probes, but nobody hears about their failures
 * beyond a warning in the log.
 */
export class CardinalityAggregator {
  private readonly store: CardinalityStore;
  private readonly cache: MemoizedCardinalityCache;
  private readonly executor: BoundedExecutor;
  private readonly ownsExecutor: boolean;
  private readonly logger: Logger;

  constructor(config: CardinalityAggregatorConfig) {
    this.store = config.store;
    this.logger = scopedLogger(config.logger ?? consoleLogger, 'cardinality');
    this.cache = new MemoizedCardinalityCache({
      store: config.store,
      maxEntries: config.cacheMaxEntries,
      maxAgeMs: config.cacheMaxAgeMs,
      cache: config.cache,
      logger: config.logger,
    });
    this.ownsExecutor = config.executor === undefined;
    this.executor = config.executor ?? new BoundedExecutor({ maxConcurrency: config.concurrency });
  }

  /**
   * Build an aggregator sized from loaded configuration
   */
  static fromConfig(store: CardinalityStore, config: CardinalityConfig, logger?: Logger): CardinalityAggregator {
    return new CardinalityAggregator({
      store,
      cacheMaxEntries: config.cardinalityCacheSize,
      cacheMaxAgeMs: config.cardinalityCacheExpirationMs,
      concurrency: config.executorConcurrency,
      logger,
    });
  }

  async getCardinalities(request: CardinalityRequest): Promise<RankedResult> {
    const ranked = new RankedResult();
    const total = request.probes.length;
    if (total === 0) {
      return ranked;
    }

    const pollingMs = request.earlyReturnEnabled ? request.pollingIntervalMs : 0;
    const queue = new CompletionQueue<ColumnCardinality>();
    for (const probe of request.probes) {
      queue.add(this.resolveColumn(request, probe));
    }

    let received = 0;
    try {
      while (received < total) {
        await this.nextRound(queue, pollingMs, request.signal);

        const failures: unknown[] = [];
        for (const outcome of queue.drain()) {
          received++;
          if (outcome.status === 'fulfilled') {
            ranked.add(outcome.value.cardinality, outcome.value.probe);
          } else {
            failures.push(outcome.reason);
          }
        }
        if (failures.length > 0) {
          throw this.lookupFailure(failures);
        }

        const smallest = ranked.smallest();
        if (request.earlyReturnEnabled && smallest && smallest.cardinality <= request.earlyReturnThreshold) {
          this.logger.debug?.(
            `Cardinality for column ${smallest.probes[0].column} is below threshold of ${request.earlyReturnThreshold}. ` +
              'Returning early while other tasks finish'
          );
          break;
        }
      }
    } finally {
      if (received < total) {
        queue.detach((outcome) => {
          if (outcome.status === 'rejected') {
            this.logger.warn(`Background cardinality lookup for ${request.schema}.${request.table} failed:`, outcome.reason);
          }
        });
      }
    }

    return ranked;
  }

  /**
   * Stop the executor (when owned) and release the cache
   */
  shutdown(): void {
    if (this.ownsExecutor) {
      this.executor.shutdown();
    }
    this.cache.destroy();
  }

  get cardinalityCache(): MemoizedCardinalityCache {
    return this.cache;
  }

  private async nextRound(queue: CompletionQueue<ColumnCardinality>, pollingMs: number, signal?: AbortSignal): Promise<void> {
    try {
      if (pollingMs > 0) {
        await sleep(pollingMs, undefined, { signal });
      } else {
        await abortable(queue.next(), signal);
      }
    } catch (error) {
      throw new CardinalityLookupError('Interrupted while waiting for cardinalities', [
        new InterruptedError(undefined, { cause: signal?.reason ?? error }),
      ]);
    }
  }

  private lookupFailure(failures: unknown[]): Error {
    const missingTable = failures.find((failure) => failure instanceof TableNotFoundError);
    if (missingTable instanceof TableNotFoundError) {
      return missingTable;
    }
    return new CardinalityLookupError('Exception when getting cardinality', failures);
  }

  private async resolveColumn(request: CardinalityRequest, probe: ProbeSpec): Promise<ColumnCardinality> {
    const start = Date.now();

    // The column task only holds its slot while fanning out; awaiting the
    // family tasks inside it could starve them of slots
    const { families } = await this.executor.submit(() => ({
      families: Promise.all(
        Array.from(probe.ranges, ([family, ranges]) =>
          this.executor.submit(() => this.resolveFamily(request, family, ranges))
        )
      ),
    }));

    const cardinality = (await families).reduce((sum, count) => sum + count, 0);
    this.logger.debug?.(`Cardinality for column ${probe.column} is ${cardinality}, took ${Date.now() - start} ms`);
    probe.cardinality = cardinality;
    return { probe, cardinality };
  }

  private async resolveFamily(request: CardinalityRequest, family: string, ranges: readonly ValueRange[]): Promise<number> {
    const exact: CacheKey[] = [];
    const nonExact: CacheKey[] = [];
    for (const range of ranges) {
      const key = new CacheKey(request.schema, request.table, family, request.auths, range);
      (isExactRange(range) ? exact : nonExact).push(key);
    }

    let sum = 0;
    if (exact.length === 1) {
      sum += await this.cache.get(exact[0]);
    } else if (exact.length > 1) {
      for (const count of (await this.cache.getAll(exact)).values()) {
        sum += count;
      }
    }

    // Non-exact ranges are never memoized
    if (nonExact.length > 0) {
      sum += await this.store.getCardinality(nonExact);
    }
    return sum;
  }
}
