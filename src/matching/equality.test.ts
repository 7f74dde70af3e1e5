import { describe, it, expect } from 'vitest';
import { box } from '../values/index.js';
import { EqualityMatcher, anything, matcherFrom, matchersEquivalent } from './equality.js';
import { isMatcher } from './types.js';

describe('EqualityMatcher', () => {
  it('should match equal boxed values and describe the expected one', () => {
    const matcher = new EqualityMatcher(box.object('twice'));

    expect(matcher.matches(box.object('twice'))).toBe(true);
    expect(matcher.matches(box.object('once'))).toBe(false);
    expect(matcher.describe()).toBe("'twice'");
  });
});

describe('matchersEquivalent', () => {
  it('should compare equality matchers by value and others by identity', () => {
    const custom = matcherFrom(() => true, 'custom');

    expect(matchersEquivalent(new EqualityMatcher(box.int8(1)), new EqualityMatcher(box.int8(1)))).toBe(true);
    expect(matchersEquivalent(new EqualityMatcher(box.int8(1)), new EqualityMatcher(box.int8(2)))).toBe(false);
    expect(matchersEquivalent(custom, custom)).toBe(true);
    expect(matchersEquivalent(custom, matcherFrom(() => true, 'custom'))).toBe(false);
  });

  it('should require equality in both directions', () => {
    const lenient = box.object({ equals: (): boolean => true });
    expect(matchersEquivalent(new EqualityMatcher(lenient), new EqualityMatcher(box.object('x')))).toBe(false);
  });
});

describe('matcherFrom', () => {
  it('should pass the unboxed and boxed value to the predicate', () => {
    const seen: unknown[] = [];
    const matcher = matcherFrom((value, boxed) => {
      seen.push(value, boxed.kind);
      return true;
    }, 'recording');

    matcher.matches(box.uint16(4));

    expect(seen).toEqual([4n, 'integer']);
    expect(isMatcher(matcher)).toBe(true);
  });

  it('should provide a shared anything matcher', () => {
    expect(anything()).toBe(anything());
    expect(anything().matches(box.none())).toBe(true);
    expect(anything().describe()).toBe('anything');
  });
});
