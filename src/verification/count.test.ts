import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  InvalidCountPredicateError,
  atLeast,
  atLeastOnce,
  atMost,
  between,
  describeCount,
  isSatisfiedBy,
  never,
  pluralizeTimes,
  times,
} from './count.js';

describe('count predicates', () => {
  it('should build inclusive ranges', () => {
    expect(times(2)).toEqual({ lowerBound: 2, upperBound: 2 });
    expect(never()).toEqual({ lowerBound: 0, upperBound: 0 });
    expect(atLeast(3)).toEqual({ lowerBound: 3, upperBound: Infinity });
    expect(atLeastOnce()).toEqual({ lowerBound: 1, upperBound: Infinity });
    expect(atMost(4)).toEqual({ lowerBound: 0, upperBound: 4 });
    expect(between(1, 5)).toEqual({ lowerBound: 1, upperBound: 5 });
  });

  it('should reject malformed bounds', () => {
    expect(() => times(-1)).toThrow(InvalidCountPredicateError);
    expect(() => between(3, 1)).toThrow('Invalid count range 3..1: lower bound exceeds upper bound');
    expect(() => atMost(1.5)).toThrow(
      'Invalid count range 0..1.5: upper bound must be a non-negative integer or Infinity'
    );
  });

  it('should be satisfied exactly by counts inside the range (property-based)', () => {
    fc.assert(
      fc.property(
        fc.nat(20),
        fc.nat(20),
        fc.nat(40),
        (a, b, count) => {
          const predicate = between(Math.min(a, b), Math.max(a, b));
          expect(isSatisfiedBy(predicate, count)).toBe(
            count >= Math.min(a, b) && count <= Math.max(a, b)
          );
        }
      )
    );
  });

  it('should describe every mode', () => {
    expect(describeCount(never())).toBe('never');
    expect(describeCount(times(1))).toBe('exactly 1 time');
    expect(describeCount(times(2))).toBe('exactly 2 times');
    expect(describeCount(atLeastOnce())).toBe('at least 1 time');
    expect(describeCount(atMost(3))).toBe('at most 3 times');
    expect(describeCount(between(2, 4))).toBe('between 2 and 4 times');
    expect(pluralizeTimes(0)).toBe('0 times');
  });
});
