/**
 * Invocation pattern: a method plus one matcher per argument position.
 * Patterns express both stub registrations and verification queries.
 *
 * @packageDocumentation
 */

import {
  assertArity,
  sameMethod,
  type InvocationRecord,
  type MethodIdentity,
} from '../invocation/index.js';
import { matchersEquivalent } from './equality.js';
import { resolveMatchers } from './resolution.js';
import { isCapturing, type Matcher, type MatcherOverrides } from './types.js';

/**
 * A method identity and one resolved matcher per argument.
 */
export class InvocationPattern {
  readonly matchers: readonly Matcher[];

  /**
   * @throws MismatchedArityError if the matcher count differs from the arity.
   */
  constructor(
    readonly method: MethodIdentity,
    matchers: readonly Matcher[]
  ) {
    assertArity(method, matchers.length);
    this.matchers = Object.freeze([...matchers]);
  }

  /**
   * Builds a pattern from call-site arguments and an optional override table.
   *
   * @see resolveMatchers
   */
  static of(
    method: MethodIdentity,
    args: readonly unknown[],
    overrides?: MatcherOverrides
  ): InvocationPattern {
    return new InvocationPattern(method, resolveMatchers(method, args, overrides));
  }

  /**
   * Whether a record is a call of this pattern's method whose every argument
   * satisfies the matcher at its position. Never captures.
   */
  matches(record: InvocationRecord): boolean {
    if (!sameMethod(this.method, record.method)) {
      return false;
    }
    return this.matchers.every((matcher, position) => matcher.matches(record.argument(position)));
  }

  /**
   * Hands every argument of a matched record to the capturing matcher at its
   * position.
   */
  captureFrom(record: InvocationRecord): void {
    this.matchers.forEach((matcher, position) => {
      if (isCapturing(matcher)) {
        matcher.capture(record.argument(position));
      }
    });
  }

  /**
   * Whether another pattern constrains the same method identically.
   */
  equivalent(other: InvocationPattern): boolean {
    if (other === this) {
      return true;
    }
    if (!sameMethod(this.method, other.method)) {
      return false;
    }
    return this.matchers.every((matcher, position) => {
      const counterpart = other.matchers[position];
      return counterpart !== undefined && matchersEquivalent(matcher, counterpart);
    });
  }

  /**
   * Renders the pattern as `name(matcher, matcher)`.
   */
  describe(): string {
    return `${this.method.name}(${this.matchers.map((matcher) => matcher.describe()).join(', ')})`;
  }
}
