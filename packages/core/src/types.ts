/**
 * Core types for Cardinal
 * These types define tables, value ranges, authorizations and cache keys
 */

export interface TableRef {
  schema: string;
  table: string;
}

/**
 * Fully-qualified table name, e.g. `default.orders`
 */
export function qualifiedName(ref: TableRef): string {
  return `${ref.schema}.${ref.table}`;
}

/**
 * Immutable set of labels a reader is entitled to see
 */
export class Authorizations implements Iterable<string> {
  static readonly EMPTY = new Authorizations();

  private readonly labels: readonly string[];

  constructor(...labels: string[]) {
    this.labels = Array.from(new Set(labels)).sort();
  }

  contains(label: string): boolean {
    return this.labels.includes(label);
  }

  get size(): number {
    return this.labels.length;
  }

  isEmpty(): boolean {
    return this.labels.length === 0;
  }

  equals(other: Authorizations): boolean {
    return this.labels.length === other.labels.length && this.labels.every((label, i) => label === other.labels[i]);
  }

  toArray(): string[] {
    return [...this.labels];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.labels[Symbol.iterator]();
  }

  toString(): string {
    return this.labels.join(',');
  }
}

export interface RangeBound {
  value: string;
  inclusive: boolean;
}

/**
 * A range of indexed values. A missing bound is infinite.
 */
export interface ValueRange {
  readonly start?: RangeBound;
  readonly end?: RangeBound;
}

/**
 * Immediate successor of a value at row granularity
 */
export function successor(value: string): string {
  return value + '\u0000';
}

export function exactRange(value: string): ValueRange {
  return { start: { value, inclusive: true }, end: { value, inclusive: true } };
}

export function rangeBetween(
  start: string,
  end: string,
  options: { startInclusive?: boolean; endInclusive?: boolean } = {}
): ValueRange {
  return {
    start: { value: start, inclusive: options.startInclusive ?? true },
    end: { value: end, inclusive: options.endInclusive ?? true },
  };
}

export function atLeast(value: string): ValueRange {
  return { start: { value, inclusive: true } };
}

export function greaterThan(value: string): ValueRange {
  return { start: { value, inclusive: false } };
}

export function atMost(value: string): ValueRange {
  return { end: { value, inclusive: true } };
}

export function lessThan(value: string): ValueRange {
  return { end: { value, inclusive: false } };
}

export function allValues(): ValueRange {
  return {};
}

function lowestIncluded(bound: RangeBound): string {
  return bound.inclusive ? bound.value : successor(bound.value);
}

function firstExcluded(bound: RangeBound): string {
  return bound.inclusive ? successor(bound.value) : bound.value;
}

/**
 * A range is exact when it denotes precisely one value: both bounds are
 * finite and the first excluded row directly follows the lowest included row.
 */
export function isExactRange(range: ValueRange): boolean {
  if (!range.start || !range.end) {
    return false;
  }
  return successor(lowestIncluded(range.start)) === firstExcluded(range.end);
}

export function rangeContains(range: ValueRange, value: string): boolean {
  if (range.start && value < lowestIncluded(range.start)) {
    return false;
  }
  if (range.end && value >= firstExcluded(range.end)) {
    return false;
  }
  return true;
}

/**
 * The single value an exact range denotes
 */
export function exactValue(range: ValueRange): string | undefined {
  return range.start && isExactRange(range) ? lowestIncluded(range.start) : undefined;
}

export function formatRange(range: ValueRange): string {
  const open = range.start ? (range.start.inclusive ? '[' : '(') + range.start.value : '(-inf';
  const close = range.end ? range.end.value + (range.end.inclusive ? ']' : ')') : '+inf)';
  return `${open}..${close}`;
}

/**
 * Memoization and store query key. Two keys are equal iff schema, table,
 * family, the full authorization set and the range all match.
 */
export class CacheKey {
  readonly id: string;

  constructor(
    readonly schema: string,
    readonly table: string,
    readonly family: string,
    readonly auths: Authorizations,
    readonly range: ValueRange
  ) {
    this.id = JSON.stringify([
      schema,
      table,
      family,
      auths.toArray(),
      range.start ? [range.start.value, range.start.inclusive] : null,
      range.end ? [range.end.value, range.end.inclusive] : null,
    ]);
  }

  equals(other: CacheKey): boolean {
    return this.id === other.id;
  }

  toString(): string {
    return `${this.schema}.${this.table}:${this.family}{${this.auths}}${formatRange(this.range)}`;
  }
}

/**
 * Split keys by the counters they read: one group per table, family and
 * authorization set. A value stored under a group counts once for the
 * whole group, however many of its ranges cover it.
 */
export function groupByCounters(keys: readonly CacheKey[]): CacheKey[][] {
  const groups = new Map<string, CacheKey[]>();
  for (const key of keys) {
    const id = JSON.stringify([key.schema, key.table, key.family, key.auths.toArray()]);
    const group = groups.get(id);
    if (group) {
      group.push(key);
    } else {
      groups.set(id, [key]);
    }
  }
  return Array.from(groups.values());
}
