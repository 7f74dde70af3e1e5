/**
 * Matcher capability types.
 *
 * @packageDocumentation
 */

import type { BoxedValue } from '../values/index.js';

/**
 * A predicate over one boxed argument, with a human-readable description.
 * Matcher libraries plug into the engine by implementing this interface.
 */
export interface Matcher {
  /** Whether the boxed argument satisfies this matcher. */
  matches(value: BoxedValue): boolean;
  /** Description used in verification failures, e.g. `'twice'` or `anything`. */
  describe(): string;
}

/**
 * A matcher that records the arguments of invocations matched during
 * verification.
 */
export interface CapturingMatcher extends Matcher {
  /** Records one matched argument. */
  capture(value: BoxedValue): void;
}

/**
 * Position-to-matcher override table. Entries replace whatever the call site
 * supplied at that argument position. Plain objects are keyed by the
 * position's decimal string, as in `{ 0: anything() }`.
 */
export type MatcherOverrides = ReadonlyMap<number, Matcher> | Readonly<Record<string, Matcher>>;

/**
 * Narrows an arbitrary value to a matcher.
 */
export function isMatcher(value: unknown): value is Matcher {
  return (
    typeof value === 'object' &&
    value !== null &&
    'matches' in value &&
    typeof value.matches === 'function' &&
    'describe' in value &&
    typeof value.describe === 'function'
  );
}

/**
 * Narrows a matcher to a capturing matcher.
 */
export function isCapturing(matcher: Matcher): matcher is CapturingMatcher {
  return 'capture' in matcher && typeof matcher.capture === 'function';
}
