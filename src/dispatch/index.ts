/**
 * Dispatch module.
 *
 * The coordinator that records and answers intercepted calls, and the
 * substitute surface tests stub and verify through.
 *
 * @packageDocumentation
 */

export { DispatchCoordinator } from './coordinator.js';
export type { DispatchCoordinatorOptions } from './coordinator.js';

export { OngoingStubbing } from './ongoing.js';
export type { VoidStubbing } from './ongoing.js';

export { CollectingReporter, VerificationFailureError, throwingReporter } from './reporter.js';
export type { CollectedFailure, FailureReporter, SourceLocation } from './reporter.js';

export {
  NonVoidMethodError,
  Substitute,
  SubstituteDisarmedError,
  createSubstitute,
} from './substitute.js';
export type { SubstituteOptions, VerifyOptions } from './substitute.js';
