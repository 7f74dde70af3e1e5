/**
 * Fluent stubbing builders returned by `given` and `givenVoid`.
 *
 * @packageDocumentation
 */

import type { InvocationPattern } from '../matching/index.js';
import {
  computing,
  returning,
  returningStruct,
  throwing,
  type AnswerComputation,
  type StubbingRegistry,
} from '../stubbing/index.js';
import { BoxingError, boxAs, isStructTag } from '../values/index.js';

/**
 * Builder that queues consecutive answers for one pattern. Every call
 * appends; the last answer repeats once the others are consumed.
 *
 * @example
 * ```typescript
 * list.given(objectAtIndex, [0]).willThrow(new RangeError('empty')).willReturn('foo');
 * ```
 */
export class OngoingStubbing {
  /**
   * @param ensureArmed - Runs before every registration; throws once the
   *   owning substitute is disarmed.
   */
  constructor(
    private readonly registry: StubbingRegistry,
    readonly pattern: InvocationPattern,
    private readonly ensureArmed: () => void
  ) {}

  /**
   * Queues a fixed return value, boxed with the method's return type.
   *
   * @throws SubstituteDisarmedError once the substitute is disarmed.
   * @throws BoxingError if the value cannot represent the return type.
   */
  willReturn(value: unknown): this {
    this.ensureArmed();
    this.registry.register(this.pattern, returning(boxAs(this.pattern.method.returnType, value)));
    return this;
  }

  /**
   * Queues fixed struct bytes.
   *
   * @throws BoxingError if the method does not return a struct or the size differs.
   */
  willReturnStruct(bytes: Uint8Array): this {
    this.ensureArmed();
    const returnType = this.pattern.method.returnType;
    if (!isStructTag(returnType)) {
      throw new BoxingError(returnType, bytes, `'${this.pattern.method.name}' does not return a struct`);
    }
    this.registry.register(this.pattern, returningStruct(returnType.layout, bytes));
    return this;
  }

  /** Queues an error raised from the call. */
  willThrow(error: unknown): this {
    this.ensureArmed();
    this.registry.register(this.pattern, throwing(error));
    return this;
  }

  /** Queues custom behavior run with the call's record. */
  willDo(compute: AnswerComputation): this {
    this.ensureArmed();
    this.registry.register(this.pattern, computing(compute));
    return this;
  }
}

/**
 * The builder for a method without a return value.
 */
export interface VoidStubbing {
  willThrow(error: unknown): VoidStubbing;
  willDo(compute: AnswerComputation): VoidStubbing;
}
