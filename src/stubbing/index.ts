/**
 * Stubbing module.
 *
 * Answers and the registry resolving them for intercepted calls.
 *
 * @packageDocumentation
 */

export {
  computing,
  describeAnswer,
  returning,
  returningStruct,
  throwing,
} from './answers.js';
export type { Answer, AnswerComputation } from './answers.js';

export { StubEntry, StubbingRegistry } from './registry.js';
export type { StubEntryState, StubbingRegistryOptions } from './registry.js';
