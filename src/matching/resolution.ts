/**
 * Matcher resolution: turns call-site arguments plus an override table into
 * one matcher per argument position.
 *
 * @packageDocumentation
 */

import { assertArity, type MethodIdentity } from '../invocation/index.js';
import { BoxingError, boxAs, type TypeTag } from '../values/index.js';
import { EqualityMatcher } from './equality.js';
import { isMatcher, type Matcher, type MatcherOverrides } from './types.js';

/**
 * Raised when an override targets a position the method does not have.
 */
export class InvalidMatcherPositionError extends Error {
  /** Name of the method. */
  public readonly method: string;
  /** The offending position, or the table key that names no position. */
  public readonly position: number | string;

  /**
   * Creates a new InvalidMatcherPositionError.
   *
   * @param method - The method the override was meant for.
   * @param position - The offending position or table key.
   */
  constructor(method: MethodIdentity, position: number | string) {
    const shown = typeof position === 'number' ? String(position) : `'${position}'`;
    super(
      `Matcher override at position ${shown} is outside '${method.name}' (arity ${String(method.argumentTypes.length)})`
    );
    this.name = 'InvalidMatcherPositionError';
    this.method = method.name;
    this.position = position;
  }
}

function isOverrideMap(
  overrides: MatcherOverrides | undefined
): overrides is ReadonlyMap<number, Matcher> {
  return overrides instanceof Map;
}

/**
 * Normalizes an override table to a map, validating every position.
 *
 * @throws InvalidMatcherPositionError for a position outside the arity.
 */
export function normalizeOverrides(
  method: MethodIdentity,
  overrides: MatcherOverrides | undefined
): ReadonlyMap<number, Matcher> {
  let entries: [number, Matcher][] = [];
  if (isOverrideMap(overrides)) {
    entries = [...overrides.entries()];
  } else if (overrides !== undefined) {
    entries = Object.entries(overrides).map(([key, matcher]): [number, Matcher] => {
      const position = Number(key);
      if (String(position) !== key) {
        throw new InvalidMatcherPositionError(method, key);
      }
      return [position, matcher];
    });
  }

  for (const [position] of entries) {
    if (!Number.isInteger(position) || position < 0 || position >= method.argumentTypes.length) {
      throw new InvalidMatcherPositionError(method, position);
    }
  }
  return new Map(entries);
}

/**
 * Resolves the matcher for one position from the call-site argument.
 * Object positions accept a matcher directly; every other literal is boxed
 * with the position's type and wrapped in an equality matcher.
 */
export function resolveArgument(tag: TypeTag, argument: unknown): Matcher {
  if (isMatcher(argument)) {
    if (tag === 'object') {
      return argument;
    }
    throw new BoxingError(
      tag,
      argument,
      'a matcher for a non-object argument must be supplied through the override table'
    );
  }
  return new EqualityMatcher(boxAs(tag, argument));
}

/**
 * Resolves one matcher per argument position. An override table entry wins
 * over whatever the call site supplied at that position.
 *
 * @param method - The method the pattern is for.
 * @param args - Call-site arguments: matchers or literals, one per position.
 * @param overrides - Optional position-to-matcher overrides.
 * @throws MismatchedArityError if `args` does not have one entry per argument.
 * @throws InvalidMatcherPositionError for an override outside the arity.
 * @throws BoxingError if a literal cannot be boxed as its position's type.
 *
 * @example
 * ```typescript
 * // Position 0 is a uint64 and cannot carry a matcher at the call site.
 * resolveMatchers(objectAtIndex, [0], { 0: anything() });
 * ```
 */
export function resolveMatchers(
  method: MethodIdentity,
  args: readonly unknown[],
  overrides?: MatcherOverrides
): Matcher[] {
  assertArity(method, args.length);
  const table = normalizeOverrides(method, overrides);

  return method.argumentTypes.map((tag, position) => {
    const override = table.get(position);
    if (override !== undefined) {
      return override;
    }
    return resolveArgument(tag, args[position]);
  });
}
