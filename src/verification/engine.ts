/**
 * Verification engine.
 *
 * Counts the recorded invocations matching a pattern and checks the count
 * against a predicate. Verification reads the log and never changes it or
 * any stub state; the only side effect is argument capture.
 *
 * @packageDocumentation
 */

import type { InvocationRecorder } from '../invocation/index.js';
import type { InvocationPattern } from '../matching/index.js';
import { Logger } from '../utils/logger.js';
import {
  assertValidCountPredicate,
  describeCount,
  isSatisfiedBy,
  type CountPredicate,
} from './count.js';
import {
  formatVerificationFailure,
  type RecordedInvocationSummary,
  type VerificationFailure,
  type VerificationResult,
} from './failure.js';

/**
 * Options for creating a VerificationEngine.
 */
export interface VerificationEngineOptions {
  /** Logger for failed verifications. */
  readonly logger?: Logger;
  /**
   * Maximum number of recorded invocations listed in a failure.
   * @defaultValue Infinity
   */
  readonly maxListedInvocations?: number;
}

/**
 * Verifies invocation counts against one substitute's recorder.
 */
export class VerificationEngine {
  private readonly logger: Logger;
  private readonly maxListedInvocations: number;

  constructor(
    private readonly recorder: InvocationRecorder,
    options: VerificationEngineOptions = {}
  ) {
    this.logger = options.logger ?? new Logger({ component: 'VerificationEngine' });
    this.maxListedInvocations = options.maxListedInvocations ?? Infinity;
  }

  /**
   * Counts the recorded invocations matching `pattern` and checks the count
   * against `predicate`. Capturing matchers in the pattern receive the
   * arguments of every matched invocation, in call order.
   *
   * @returns A passed result, or a failed result carrying the failure.
   * @throws InvalidCountPredicateError for a malformed predicate.
   */
  verify(pattern: InvocationPattern, predicate: CountPredicate): VerificationResult {
    assertValidCountPredicate(predicate);

    const invocations: RecordedInvocationSummary[] = [];
    let count = 0;
    for (const record of this.recorder.invocationsOf(pattern.method)) {
      const matched = pattern.matches(record);
      if (matched) {
        count += 1;
        pattern.captureFrom(record);
      }
      invocations.push({ sequence: record.sequence, description: record.describe(), matched });
    }

    if (isSatisfiedBy(predicate, count)) {
      return { passed: true, count };
    }

    const details = {
      method: pattern.method.name,
      pattern: pattern.describe(),
      expected: predicate,
      actual: count,
      invocations: Object.freeze(invocations),
    };
    const failure: VerificationFailure = {
      ...details,
      expectedDescription: describeCount(predicate),
      description: formatVerificationFailure(details, {
        maxListedInvocations: this.maxListedInvocations,
      }),
    };
    this.logger.debug('verification_failed', {
      pattern: failure.pattern,
      expected: failure.expectedDescription,
      actual: count,
    });
    return { passed: false, count, failure };
  }
}
