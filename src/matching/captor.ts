/**
 * Argument captor.
 *
 * @packageDocumentation
 */

import type { BoxedValue } from '../values/index.js';
import type { CapturingMatcher, Matcher } from './types.js';

/**
 * Capturing matcher. Matches anything (or whatever an inner matcher
 * matches) and, during verification, records the argument of every
 * invocation the whole pattern matched.
 *
 * Captured values accumulate for the captor's lifetime: verifying twice
 * with the same captor records the matched arguments twice.
 *
 * @example
 * ```typescript
 * const captor = new ArgumentCaptor();
 * substitute.verify(addObject, [captor], times(2));
 * captor.allValues; // both boxed arguments, in call order
 * ```
 */
export class ArgumentCaptor implements CapturingMatcher {
  private readonly captured: BoxedValue[] = [];

  /**
   * @param inner - Optional matcher restricting which arguments match.
   */
  constructor(private readonly inner?: Matcher) {}

  matches(value: BoxedValue): boolean {
    return this.inner === undefined || this.inner.matches(value);
  }

  describe(): string {
    return this.inner === undefined ? '<capturing>' : `<capturing ${this.inner.describe()}>`;
  }

  /** The captor itself, for use in an argument list or override table. */
  get matcher(): CapturingMatcher {
    return this;
  }

  capture(value: BoxedValue): void {
    this.captured.push(value);
  }

  /** The most recently captured argument, or `undefined` if none. */
  get value(): BoxedValue | undefined {
    return this.captured[this.captured.length - 1];
  }

  /** Every captured argument, in capture order. */
  get allValues(): readonly BoxedValue[] {
    return Object.freeze([...this.captured]);
  }
}
