import type { Authorizations, CardinalityStore, Logger } from '@cardinal/core';
import { consoleLogger, scopedLogger } from '@cardinal/core';
import type { CardinalityAggregator } from './aggregator';
import { DEFAULT_SESSION_PROPERTIES, resolveSession, type SessionProperties } from './config';
import type { ProbeSpec, RankedResult } from './types';

export interface IndexSelectorOptions {
  aggregator: CardinalityAggregator;
  store: CardinalityStore;
  session?: Partial<SessionProperties>;
  logger?: Logger;
}

export interface IndexSelectionRequest {
  schema: string;
  table: string;
  auths: Authorizations;
  probes: ProbeSpec[];
  session?: Partial<SessionProperties>;
  signal?: AbortSignal;
}

export interface IndexSelection {
  /** Most selective probe, when the index should be used */
  probe?: ProbeSpec;
  useIndex: boolean;
  numRows: number;
  /** Smallest cardinality over the table's row count */
  ratio: number;
  ranked: RankedResult;
}

/**
 * Picks the indexed column matching the fewest rows, or none when even the
 * best one matches too large a share of the table for an index scan to pay off.
 */
export class IndexSelector {
  private readonly aggregator: CardinalityAggregator;
  private readonly store: CardinalityStore;
  private readonly session: SessionProperties;
  private readonly logger: Logger;

  constructor(options: IndexSelectorOptions) {
    this.aggregator = options.aggregator;
    this.store = options.store;
    this.session = resolveSession(options.session, DEFAULT_SESSION_PROPERTIES);
    this.logger = scopedLogger(options.logger ?? consoleLogger, 'index-selector');
  }

  async select(request: IndexSelectionRequest): Promise<IndexSelection> {
    const session = resolveSession(request.session, this.session);
    const numRows = await this.store.getNumRowsInTable(request.schema, request.table);
    const earlyReturnThreshold = Math.floor(numRows * session.lowestCardinalityThreshold);

    const ranked = await this.aggregator.getCardinalities({
      schema: request.schema,
      table: request.table,
      auths: request.auths,
      probes: request.probes,
      earlyReturnThreshold,
      pollingIntervalMs: session.pollingIntervalMs,
      earlyReturnEnabled: session.earlyReturnEnabled,
      signal: request.signal,
    });

    const smallest = ranked.smallest();
    if (!smallest) {
      return { useIndex: false, numRows, ratio: 1, ranked };
    }

    const ratio = numRows === 0 ? 0 : smallest.cardinality / numRows;
    const probe = smallest.probes[0];
    if (ratio > session.indexThreshold) {
      this.logger.debug?.(
        `Smallest cardinality ${smallest.cardinality} of column ${probe.column} is ${ratio} of ${numRows} rows, ` +
          `above index threshold ${session.indexThreshold}. Not using index`
      );
      return { useIndex: false, numRows, ratio, ranked };
    }

    this.logger.debug?.(`Using index on column ${probe.column}: ${smallest.cardinality} of ${numRows} rows`);
    return { probe, useIndex: true, numRows, ratio, ranked };
  }
}
