/**
 * Invocation module.
 *
 * Method identities, invocation records and the per-substitute recorder.
 *
 * @packageDocumentation
 */

export {
  MismatchedArityError,
  arityOf,
  assertArity,
  defineMethod,
  methodKey,
  sameMethod,
} from './method.js';
export type { MethodIdentity, MethodSignature } from './method.js';

export { InvocationRecord, ReturnValueAlreadySetError } from './record.js';

export { InvocationRecorder } from './recorder.js';
