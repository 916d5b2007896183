import type { Authorizations, ValueRange } from '@cardinal/core';

export interface ProbeSpecInit {
  column: string;
  family: string;
  ranges?: ValueRange[];
}

/**
 * Candidate indexed column and the value ranges to probe for it.
 * `cardinality` is filled in by the aggregator once the column resolves.
 */
export class ProbeSpec {
  readonly column: string;
  readonly family: string;
  readonly ranges = new Map<string, ValueRange[]>();
  cardinality?: number;

  constructor(init: ProbeSpecInit) {
    this.column = init.column;
    this.family = init.family;
    if (init.ranges && init.ranges.length > 0) {
      this.addRanges(init.family, init.ranges);
    }
  }

  /**
   * Probe additional ranges, possibly under another column family
   */
  addRanges(family: string, ranges: ValueRange[]): this {
    const existing = this.ranges.get(family);
    if (existing) {
      existing.push(...ranges);
    } else {
      this.ranges.set(family, [...ranges]);
    }
    return this;
  }
}

/**
 * Probes grouped by resolved cardinality, iterated smallest first.
 * Order within a group is unspecified.
 */
export class RankedResult implements Iterable<[number, readonly ProbeSpec[]]> {
  private readonly groups = new Map<number, ProbeSpec[]>();
  private keys: number[] = [];
  private count = 0;

  add(cardinality: number, probe: ProbeSpec): void {
    const group = this.groups.get(cardinality);
    if (group) {
      group.push(probe);
    } else {
      this.groups.set(cardinality, [probe]);
      this.keys = [...this.keys, cardinality].sort((a, b) => a - b);
    }
    this.count++;
  }

  smallest(): { cardinality: number; probes: readonly ProbeSpec[] } | undefined {
    if (this.keys.length === 0) {
      return undefined;
    }
    const cardinality = this.keys[0];
    return { cardinality, probes: this.get(cardinality) };
  }

  get(cardinality: number): readonly ProbeSpec[] {
    return this.groups.get(cardinality) ?? [];
  }

  cardinalities(): number[] {
    return [...this.keys];
  }

  /**
   * Flattened (cardinality, probe) pairs in ascending cardinality
   */
  entries(): Array<[number, ProbeSpec]> {
    return this.keys.flatMap((key) => this.get(key).map((probe): [number, ProbeSpec] => [key, probe]));
  }

  /**
   * Number of probes held
   */
  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  *[Symbol.iterator](): Iterator<[number, readonly ProbeSpec[]]> {
    for (const key of this.keys) {
      yield [key, this.get(key)];
    }
  }
}

/**
 * Input to CardinalityAggregator.getCardinalities
 */
export interface CardinalityRequest {
  schema: string;
  table: string;
  auths: Authorizations;
  probes: ProbeSpec[];
  /** Return once the smallest cardinality seen is at or below this value */
  earlyReturnThreshold: number;
  pollingIntervalMs: number;
  earlyReturnEnabled: boolean;
  /** Aborting while the call waits fails it with an InterruptedError */
  signal?: AbortSignal;
}
