/**
 * Literal-equality matcher and matcher equivalence.
 *
 * @packageDocumentation
 */

import { boxedEquals, describeBoxed, unbox, type BoxedValue } from '../values/index.js';
import type { Matcher } from './types.js';

/**
 * Matcher built automatically from a literal argument. Compares boxed
 * primitives by value and object references by identity, then `equals`,
 * then deep strict equality.
 */
export class EqualityMatcher implements Matcher {
  constructor(readonly expected: BoxedValue) {}

  matches(value: BoxedValue): boolean {
    return boxedEquals(this.expected, value);
  }

  describe(): string {
    return describeBoxed(this.expected);
  }
}

/**
 * Whether two matchers constrain a position identically: the same instance,
 * or two equality matchers with mutually equal expected values.
 */
export function matchersEquivalent(a: Matcher, b: Matcher): boolean {
  if (a === b) {
    return true;
  }
  if (a instanceof EqualityMatcher && b instanceof EqualityMatcher) {
    return boxedEquals(a.expected, b.expected) && boxedEquals(b.expected, a.expected);
  }
  return false;
}

/**
 * Adapts a plain predicate to the matcher interface. The predicate receives
 * the unboxed value first and the boxed value second.
 *
 * @example
 * ```typescript
 * const anything = matcherFrom(() => true, 'anything');
 * const positive = matcherFrom((value) => typeof value === 'bigint' && value > 0n, 'positive');
 * ```
 */
export function matcherFrom(
  predicate: (value: unknown, boxed: BoxedValue) => boolean,
  description: string
): Matcher {
  return {
    matches: (value: BoxedValue): boolean => predicate(unbox(value), value),
    describe: (): string => description,
  };
}

const ANYTHING: Matcher = Object.freeze(matcherFrom(() => true, 'anything'));

/**
 * Matcher accepting every argument. Always the same instance, so two
 * patterns built with it are equivalent.
 */
export function anything(): Matcher {
  return ANYTHING;
}
