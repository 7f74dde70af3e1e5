/**
 * Answers: what a stubbed call does when it is resolved.
 *
 * @packageDocumentation
 */

import type { InvocationRecord } from '../invocation/index.js';
import { box, describeBoxed, type BoxedValue, type StructLayout } from '../values/index.js';

/**
 * Custom behavior run with the record of the call being answered. A boxed
 * result is returned as-is; any other result is boxed with the method's
 * return type.
 */
export type AnswerComputation = (record: InvocationRecord) => unknown;

/**
 * Behavior applied to a resolved call.
 *
 * - `return`: a fixed boxed value (struct bytes included)
 * - `throw`: an error raised from the intercepted call
 * - `compute`: custom behavior producing the return value
 */
export type Answer =
  | { readonly kind: 'return'; readonly value: BoxedValue }
  | { readonly kind: 'throw'; readonly error: unknown }
  | { readonly kind: 'compute'; readonly compute: AnswerComputation };

function freeze(answer: Answer): Answer {
  Object.freeze(answer);
  return answer;
}

/** Answer returning a fixed boxed value. */
export function returning(value: BoxedValue): Answer {
  return freeze({ kind: 'return', value });
}

/** Answer returning fixed struct bytes. */
export function returningStruct(layout: StructLayout, bytes: Uint8Array): Answer {
  return returning(box.struct(layout, bytes));
}

/** Answer raising an error. */
export function throwing(error: unknown): Answer {
  return freeze({ kind: 'throw', error });
}

/** Answer running custom behavior. */
export function computing(compute: AnswerComputation): Answer {
  return freeze({ kind: 'compute', compute });
}

/**
 * Short description of an answer for logs.
 */
export function describeAnswer(answer: Answer): string {
  switch (answer.kind) {
    case 'return':
      return `return ${describeBoxed(answer.value)}`;
    case 'throw':
      return `throw ${answer.error instanceof Error ? answer.error.name : String(answer.error)}`;
    case 'compute':
      return 'compute';
  }
}
