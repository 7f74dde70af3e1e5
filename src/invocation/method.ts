/**
 * Method identity: the descriptor every intercepted call, stub and
 * verification query is keyed on.
 *
 * @packageDocumentation
 */

import { tagKey, type TypeTag } from '../values/index.js';

/**
 * Identity of an intercepted method: its name plus the wire type of every
 * argument and of the return value.
 */
export interface MethodIdentity {
  /** Method (selector) name. */
  readonly name: string;
  /** Wire type of each argument, in order. */
  readonly argumentTypes: readonly TypeTag[];
  /** Wire type of the return value. */
  readonly returnType: TypeTag;
  /** Canonical key; identities with equal keys are the same method. */
  readonly key: string;
}

/**
 * Signature of a method being defined.
 */
export interface MethodSignature {
  /**
   * Argument types, in order.
   * @defaultValue []
   */
  readonly args?: readonly TypeTag[];
  /**
   * Return type.
   * @defaultValue 'void'
   */
  readonly returns?: TypeTag;
}

/**
 * Raised when a list of arguments or matchers does not have one entry per
 * declared argument of a method.
 */
export class MismatchedArityError extends Error {
  /** Name of the method. */
  public readonly method: string;
  /** Declared number of arguments. */
  public readonly expected: number;
  /** Number of entries supplied. */
  public readonly actual: number;

  /**
   * Creates a new MismatchedArityError.
   *
   * @param method - The method whose arity was violated.
   * @param actual - Number of entries supplied.
   */
  constructor(method: MethodIdentity, actual: number) {
    super(
      `Method '${method.name}' takes ${String(method.argumentTypes.length)} argument(s) but ${String(actual)} were supplied`
    );
    this.name = 'MismatchedArityError';
    this.method = method.name;
    this.expected = method.argumentTypes.length;
    this.actual = actual;
  }
}

/**
 * Defines a method identity.
 *
 * @example
 * ```typescript
 * const objectAtIndex = defineMethod('objectAtIndex:', { args: ['uint64'], returns: 'object' });
 * objectAtIndex.key; // "objectAtIndex:(uint64)->object"
 * ```
 */
export function defineMethod(name: string, signature: MethodSignature = {}): MethodIdentity {
  const argumentTypes = Object.freeze([...(signature.args ?? [])]);
  const returnType = signature.returns ?? 'void';
  const key = methodKey(name, argumentTypes, returnType);
  return Object.freeze({ name, argumentTypes, returnType, key });
}

/**
 * Canonical key of a name and signature: `name(arg,arg)->return`.
 */
export function methodKey(
  name: string,
  argumentTypes: readonly TypeTag[],
  returnType: TypeTag
): string {
  return `${name}(${argumentTypes.map(tagKey).join(',')})->${tagKey(returnType)}`;
}

/** Number of declared arguments. */
export function arityOf(method: MethodIdentity): number {
  return method.argumentTypes.length;
}

/** Whether two identities denote the same method. */
export function sameMethod(a: MethodIdentity, b: MethodIdentity): boolean {
  return a.key === b.key;
}

/**
 * Throws a MismatchedArityError unless `count` equals the method's arity.
 */
export function assertArity(method: MethodIdentity, count: number): void {
  if (count !== method.argumentTypes.length) {
    throw new MismatchedArityError(method, count);
  }
}
