/**
 * Invocation record: the inspectable snapshot of one intercepted call.
 *
 * @packageDocumentation
 */

import {
  assertBoxedMatchesTag,
  describeBoxed,
  type BoxedValue,
} from '../values/index.js';
import { assertArity, type MethodIdentity } from './method.js';

/**
 * Raised when the return-value slot of a record is written twice.
 */
export class ReturnValueAlreadySetError extends Error {
  /** Name of the method whose record was written twice. */
  public readonly method: string;

  /**
   * Creates a new ReturnValueAlreadySetError.
   *
   * @param method - The method of the record.
   */
  constructor(method: MethodIdentity) {
    super(`Return value of '${method.name}' invocation was already set`);
    this.name = 'ReturnValueAlreadySetError';
    this.method = method.name;
  }
}

/**
 * Immutable snapshot of one intercepted call. Only the return-value slot is
 * writable, and only once.
 */
export class InvocationRecord {
  /** Arguments, boxed, one per declared argument type. */
  readonly args: readonly BoxedValue[];
  private returned: BoxedValue | undefined;

  /**
   * Creates a record, checking the arguments against the method's types.
   *
   * @param target - Identity of the substitute that received the call.
   * @param method - The method invoked.
   * @param args - Boxed arguments.
   * @param sequence - Position of the call in its substitute's log.
   * @throws MismatchedArityError if the argument count differs from the arity.
   * @throws BoxedTypeMismatchError if an argument does not conform to its type.
   */
  constructor(
    readonly target: unknown,
    readonly method: MethodIdentity,
    args: readonly BoxedValue[],
    readonly sequence: number
  ) {
    assertArity(method, args.length);
    args.forEach((arg, index) => {
      const tag = method.argumentTypes[index];
      if (tag !== undefined) {
        assertBoxedMatchesTag(tag, arg);
      }
    });
    this.args = Object.freeze([...args]);
  }

  /**
   * Returns one argument.
   *
   * @throws RangeError if the index is outside the arity.
   */
  argument(index: number): BoxedValue {
    const arg = this.args[index];
    if (arg === undefined) {
      throw new RangeError(
        `'${this.method.name}' has no argument at index ${String(index)}`
      );
    }
    return arg;
  }

  /** The return value, or `undefined` while unset. */
  get returnValue(): BoxedValue | undefined {
    return this.returned;
  }

  /**
   * Writes the return-value slot.
   *
   * @throws ReturnValueAlreadySetError on a second write.
   * @throws BoxedTypeMismatchError if the value does not conform to the return type.
   */
  setReturnValue(value: BoxedValue): void {
    if (this.returned !== undefined) {
      throw new ReturnValueAlreadySetError(this.method);
    }
    assertBoxedMatchesTag(this.method.returnType, value);
    this.returned = value;
  }

  /**
   * Renders the call as `name(arg, arg)`.
   *
   * @example
   * ```typescript
   * record.describe(); // "addObject:('once')"
   * ```
   */
  describe(): string {
    return `${this.method.name}(${this.args.map(describeBoxed).join(', ')})`;
  }
}
