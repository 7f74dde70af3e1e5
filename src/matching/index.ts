/**
 * Matching module.
 *
 * Matcher capability, literal-equality and capturing matchers, matcher
 * resolution with per-position overrides, and invocation patterns.
 *
 * @packageDocumentation
 */

export { isCapturing, isMatcher } from './types.js';
export type { CapturingMatcher, Matcher, MatcherOverrides } from './types.js';

export { EqualityMatcher, anything, matcherFrom, matchersEquivalent } from './equality.js';

export { ArgumentCaptor } from './captor.js';

export {
  InvalidMatcherPositionError,
  normalizeOverrides,
  resolveArgument,
  resolveMatchers,
} from './resolution.js';

export { InvocationPattern } from './pattern.js';
