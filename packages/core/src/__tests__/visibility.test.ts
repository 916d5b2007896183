import { describe, it, expect } from 'vitest';
import { InvalidVisibilityError } from '../errors';
import { Authorizations } from '../types';
import { isVisible, parseVisibility } from '../visibility';

describe('parseVisibility', () => {
  it('returns undefined for the empty expression', () => {
    expect(parseVisibility('')).toBeUndefined();
  });

  it('parses nested groups', () => {
    expect(parseVisibility('(a|b)&c')).toEqual({
      kind: 'and',
      children: [
        {
          kind: 'or',
          children: [
            { kind: 'label', label: 'a' },
            { kind: 'label', label: 'b' },
          ],
        },
        { kind: 'label', label: 'c' },
      ],
    });
  });

  it.each(['a&b|c', 'a&', '(a', 'a)', '&a', 'a b'])('rejects %j', (expression) => {
    expect(() => parseVisibility(expression)).toThrow(InvalidVisibilityError);
  });
});

describe('isVisible', () => {
  const foo = new Authorizations('foo');
  const fooBar = new Authorizations('foo', 'bar');

  it('shows unlabelled counts to everyone', () => {
    expect(isVisible('', Authorizations.EMPTY)).toBe(true);
  });

  it('requires a plain label to be held', () => {
    expect(isVisible('foo', Authorizations.EMPTY)).toBe(false);
    expect(isVisible('foo', foo)).toBe(true);
    expect(isVisible('bar', foo)).toBe(false);
  });

  it('evaluates conjunctions and disjunctions', () => {
    expect(isVisible('foo&bar', foo)).toBe(false);
    expect(isVisible('foo&bar', fooBar)).toBe(true);
    expect(isVisible('bar|baz', foo)).toBe(false);
    expect(isVisible('foo|baz', foo)).toBe(true);
    expect(isVisible('(bar|baz)&foo', fooBar)).toBe(true);
  });
});
