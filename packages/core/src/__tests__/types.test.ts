import { describe, it, expect } from 'vitest';
import {
  Authorizations,
  CacheKey,
  allValues,
  atLeast,
  atMost,
  exactRange,
  exactValue,
  formatRange,
  greaterThan,
  isExactRange,
  lessThan,
  rangeBetween,
  rangeContains,
} from '../types';

describe('Authorizations', () => {
  it('de-duplicates and sorts labels', () => {
    const auths = new Authorizations('foo', 'bar', 'foo');
    expect(auths.toArray()).toEqual(['bar', 'foo']);
    expect(auths.size).toBe(2);
    expect(auths.toString()).toBe('bar,foo');
  });

  it('compares as a set', () => {
    expect(new Authorizations('foo', 'bar').equals(new Authorizations('bar', 'foo'))).toBe(true);
    expect(new Authorizations('foo').equals(new Authorizations('foo', 'bar'))).toBe(false);
    expect(Authorizations.EMPTY.isEmpty()).toBe(true);
  });

  it('does not confuse a label containing a comma with two labels', () => {
    const joined = new Authorizations('a,b');
    const split = new Authorizations('a', 'b');

    expect(joined.equals(split)).toBe(false);
    expect(split.equals(joined)).toBe(false);
    expect(new CacheKey('s', 't', 'f', joined, allValues()).equals(new CacheKey('s', 't', 'f', split, allValues()))).toBe(
      false
    );
  });
});

describe('isExactRange', () => {
  it('accepts ranges that denote a single value', () => {
    expect(isExactRange(exactRange('abc'))).toBe(true);
    expect(isExactRange(rangeBetween('b', 'b'))).toBe(true);
    expect(isExactRange(rangeBetween('b', 'b\u0000', { endInclusive: false }))).toBe(true);
  });

  it('rejects open and multi-value ranges', () => {
    expect(isExactRange(rangeBetween('a', 'z'))).toBe(false);
    expect(isExactRange(rangeBetween('b', 'b', { endInclusive: false }))).toBe(false);
    expect(isExactRange(atLeast('b'))).toBe(false);
    expect(isExactRange(atMost('b'))).toBe(false);
    expect(isExactRange(allValues())).toBe(false);
  });

  it('reports the value of an exact range', () => {
    expect(exactValue(exactRange('abc'))).toBe('abc');
    expect(exactValue(rangeBetween('a', 'z'))).toBeUndefined();
  });
});

describe('rangeContains', () => {
  it('respects bound inclusivity', () => {
    const range = rangeBetween('b', 'd', { startInclusive: false, endInclusive: false });
    expect(rangeContains(range, 'b')).toBe(false);
    expect(rangeContains(range, 'bz')).toBe(true);
    expect(rangeContains(range, 'c')).toBe(true);
    expect(rangeContains(range, 'd')).toBe(false);
  });

  it('includes only the end row itself for an inclusive end', () => {
    const range = rangeBetween('a', 'z');
    expect(rangeContains(range, 'abc')).toBe(true);
    expect(rangeContains(range, 'z')).toBe(true);
    expect(rangeContains(range, 'zebra')).toBe(false);
  });

  it('treats missing bounds as infinite', () => {
    expect(rangeContains(greaterThan('m'), 'm')).toBe(false);
    expect(rangeContains(greaterThan('m'), 'n')).toBe(true);
    expect(rangeContains(lessThan('m'), 'l')).toBe(true);
    expect(rangeContains(allValues(), '')).toBe(true);
  });
});

describe('CacheKey', () => {
  it('is equal when every field matches', () => {
    const a = new CacheKey('default', 't', 'cf_a', new Authorizations('x', 'y'), exactRange('v'));
    const b = new CacheKey('default', 't', 'cf_a', new Authorizations('y', 'x'), exactRange('v'));
    expect(a.equals(b)).toBe(true);
    expect(a.id).toBe(b.id);
  });

  it('differs on the authorization set', () => {
    const a = new CacheKey('default', 't', 'cf_a', new Authorizations('x'), exactRange('v'));
    const b = new CacheKey('default', 't', 'cf_a', new Authorizations('x', 'y'), exactRange('v'));
    expect(a.equals(b)).toBe(false);
  });

  it('differs on range inclusivity', () => {
    const a = new CacheKey('default', 't', 'cf_a', Authorizations.EMPTY, rangeBetween('a', 'z'));
    const b = new CacheKey('default', 't', 'cf_a', Authorizations.EMPTY, rangeBetween('a', 'z', { endInclusive: false }));
    expect(a.equals(b)).toBe(false);
  });

  it('formats for logs', () => {
    const key = new CacheKey('default', 't', 'cf_a', new Authorizations('foo'), atLeast('m'));
    expect(key.toString()).toBe('default.t:cf_a{foo}[m..+inf)');
    expect(formatRange(rangeBetween('a', 'z', { startInclusive: false }))).toBe('(a..z]');
  });
});
