/**
 * Failure reporting for verifications.
 *
 * @packageDocumentation
 */

import type { VerificationFailure } from '../verification/index.js';

/**
 * Where a verification was written, as supplied by the caller.
 */
export interface SourceLocation {
  readonly file: string;
  readonly line: number;
}

/**
 * Receives every failed verification of a substitute.
 */
export interface FailureReporter {
  report(failure: VerificationFailure, location?: SourceLocation): void;
}

/**
 * Raised by the default reporter for a failed verification.
 */
export class VerificationFailureError extends Error {
  /** The structured failure. */
  public readonly failure: VerificationFailure;
  /** The verification's source location, if supplied. */
  public readonly location: SourceLocation | undefined;

  /**
   * Creates a new VerificationFailureError.
   *
   * @param failure - The structured failure.
   * @param location - The verification's source location.
   */
  constructor(failure: VerificationFailure, location?: SourceLocation) {
    const prefix = location === undefined ? '' : `${location.file}:${String(location.line)}: `;
    super(`${prefix}${failure.description}`);
    this.name = 'VerificationFailureError';
    this.failure = failure;
    this.location = location;
  }
}

/**
 * Default reporter: throws a VerificationFailureError.
 */
export const throwingReporter: FailureReporter = {
  report(failure, location) {
    throw new VerificationFailureError(failure, location);
  },
};

/**
 * One collected report.
 */
export interface CollectedFailure {
  readonly failure: VerificationFailure;
  readonly location: SourceLocation | undefined;
}

/**
 * Reporter that keeps failures instead of throwing.
 *
 * @example
 * ```typescript
 * const reporter = new CollectingReporter();
 * const list = createSubstitute({ reporter });
 * list.verify(addObject, ['never-added']);
 * reporter.failures[0]?.failure.actual; // 0
 * ```
 */
export class CollectingReporter implements FailureReporter {
  private collected: CollectedFailure[] = [];

  report(failure: VerificationFailure, location?: SourceLocation): void {
    this.collected.push({ failure, location });
  }

  /** Collected failures, oldest first. */
  get failures(): readonly CollectedFailure[] {
    return Object.freeze([...this.collected]);
  }

  /** Forgets every collected failure. */
  clear(): void {
    this.collected = [];
  }
}
