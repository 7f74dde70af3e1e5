/**
 * Count predicates (verification modes).
 *
 * @packageDocumentation
 */

/**
 * Inclusive range of acceptable call counts. `upperBound` may be
 * `Infinity` for "unbounded".
 */
export interface CountPredicate {
  readonly lowerBound: number;
  readonly upperBound: number;
}

/**
 * Raised for a count predicate with a negative or fractional bound, or a
 * lower bound above the upper bound.
 */
export class InvalidCountPredicateError extends Error {
  /** The offending lower bound. */
  public readonly lowerBound: number;
  /** The offending upper bound. */
  public readonly upperBound: number;

  /**
   * Creates a new InvalidCountPredicateError.
   *
   * @param lowerBound - The offending lower bound.
   * @param upperBound - The offending upper bound.
   * @param reason - What is wrong with the bounds.
   */
  constructor(lowerBound: number, upperBound: number, reason: string) {
    super(
      `Invalid count range ${String(lowerBound)}..${String(upperBound)}: ${reason}`
    );
    this.name = 'InvalidCountPredicateError';
    this.lowerBound = lowerBound;
    this.upperBound = upperBound;
  }
}

/**
 * Throws an InvalidCountPredicateError unless the predicate is well formed.
 */
export function assertValidCountPredicate(predicate: CountPredicate): void {
  const { lowerBound, upperBound } = predicate;
  if (!Number.isInteger(lowerBound) || lowerBound < 0) {
    throw new InvalidCountPredicateError(lowerBound, upperBound, 'lower bound must be a non-negative integer');
  }
  if (upperBound !== Infinity && (!Number.isInteger(upperBound) || upperBound < 0)) {
    throw new InvalidCountPredicateError(
      lowerBound,
      upperBound,
      'upper bound must be a non-negative integer or Infinity'
    );
  }
  if (lowerBound > upperBound) {
    throw new InvalidCountPredicateError(lowerBound, upperBound, 'lower bound exceeds upper bound');
  }
}

/**
 * Creates a validated count predicate.
 *
 * @throws InvalidCountPredicateError for malformed bounds.
 */
export function between(lowerBound: number, upperBound: number): CountPredicate {
  const predicate = Object.freeze({ lowerBound, upperBound });
  assertValidCountPredicate(predicate);
  return predicate;
}

/** Exactly `count` calls. */
export function times(count: number): CountPredicate {
  return between(count, count);
}

/** No calls at all. */
export function never(): CountPredicate {
  return between(0, 0);
}

/** `count` calls or more. */
export function atLeast(count: number): CountPredicate {
  return between(count, Infinity);
}

/** One call or more. */
export function atLeastOnce(): CountPredicate {
  return atLeast(1);
}

/** At most `count` calls. */
export function atMost(count: number): CountPredicate {
  return between(0, count);
}

/** Whether a count lies inside the predicate's range. */
export function isSatisfiedBy(predicate: CountPredicate, count: number): boolean {
  return predicate.lowerBound <= count && count <= predicate.upperBound;
}

/**
 * Formats a count with its unit, e.g. `1 time` or `3 times`.
 */
export function pluralizeTimes(count: number): string {
  return count === 1 ? '1 time' : `${String(count)} times`;
}

/**
 * Human-readable description of a predicate.
 *
 * @example
 * ```typescript
 * describeCount(times(2));   // "exactly 2 times"
 * describeCount(never());    // "never"
 * describeCount(atLeast(1)); // "at least 1 time"
 * ```
 */
export function describeCount(predicate: CountPredicate): string {
  const { lowerBound, upperBound } = predicate;
  if (lowerBound === upperBound) {
    return lowerBound === 0 ? 'never' : `exactly ${pluralizeTimes(lowerBound)}`;
  }
  if (upperBound === Infinity) {
    return `at least ${pluralizeTimes(lowerBound)}`;
  }
  if (lowerBound === 0) {
    return `at most ${pluralizeTimes(upperBound)}`;
  }
  return `between ${String(lowerBound)} and ${pluralizeTimes(upperBound)}`;
}
