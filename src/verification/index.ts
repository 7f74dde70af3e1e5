/**
 * Verification module.
 *
 * Count predicates, the verification engine and failure descriptions.
 *
 * @packageDocumentation
 */

export {
  InvalidCountPredicateError,
  assertValidCountPredicate,
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
export type { CountPredicate } from './count.js';

export { formatVerificationFailure } from './failure.js';
export type {
  FormatFailureOptions,
  RecordedInvocationSummary,
  VerificationFailure,
  VerificationResult,
} from './failure.js';

export { VerificationEngine } from './engine.js';
export type { VerificationEngineOptions } from './engine.js';
