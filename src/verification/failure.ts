/**
 * Verification results and failure descriptions.
 *
 * @packageDocumentation
 */

import { describeCount, pluralizeTimes, type CountPredicate } from './count.js';

/**
 * One recorded invocation of the verified method, listed for context.
 */
export interface RecordedInvocationSummary {
  /** Position of the call in the substitute's log. */
  readonly sequence: number;
  /** Rendered call, e.g. `addObject:('once')`. */
  readonly description: string;
  /** Whether the call matched the verified pattern. */
  readonly matched: boolean;
}

/**
 * Structured description of a failed verification.
 */
export interface VerificationFailure {
  /** Name of the verified method. */
  readonly method: string;
  /** Rendered pattern, e.g. `addObject:('twice')`. */
  readonly pattern: string;
  /** The expected count range. */
  readonly expected: CountPredicate;
  /** Rendered expected range, e.g. `exactly 1 time`. */
  readonly expectedDescription: string;
  /** Number of matching invocations found. */
  readonly actual: number;
  /** Every recorded invocation of the method, matched or not. */
  readonly invocations: readonly RecordedInvocationSummary[];
  /** Full multi-line description. */
  readonly description: string;
}

/**
 * Outcome of one verification.
 */
export type VerificationResult =
  | { readonly passed: true; readonly count: number }
  | { readonly passed: false; readonly count: number; readonly failure: VerificationFailure };

/**
 * Options for rendering a failure description.
 */
export interface FormatFailureOptions {
  /**
   * Maximum number of recorded invocations listed; the rest are counted.
   * @defaultValue Infinity
   */
  readonly maxListedInvocations?: number;
}

/**
 * Renders the description of a failed verification.
 *
 * @example
 * ```text
 * Expected addObject:('twice') to be called exactly 1 time, but was called 2 times.
 * Recorded invocations of 'addObject:':
 *   1. addObject:('once')
 *   2. addObject:('twice') [matched]
 *   3. addObject:('twice') [matched]
 * ```
 */
export function formatVerificationFailure(
  failure: Omit<VerificationFailure, 'description' | 'expectedDescription'>,
  options: FormatFailureOptions = {}
): string {
  const maxListed = options.maxListedInvocations ?? Infinity;
  const lines = [
    `Expected ${failure.pattern} to be called ${describeCount(failure.expected)}, but was called ${pluralizeTimes(failure.actual)}.`,
  ];

  if (failure.invocations.length === 0) {
    lines.push(`No invocations of '${failure.method}' were recorded.`);
    return lines.join('\n');
  }

  lines.push(`Recorded invocations of '${failure.method}':`);
  failure.invocations.slice(0, maxListed).forEach((invocation, index) => {
    const marker = invocation.matched ? ' [matched]' : '';
    lines.push(`  ${String(index + 1)}. ${invocation.description}${marker}`);
  });
  const hidden = failure.invocations.length - maxListed;
  if (hidden > 0) {
    lines.push(`  ... and ${String(hidden)} more`);
  }
  return lines.join('\n');
}
