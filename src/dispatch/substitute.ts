/**
 * Substitutes: the test-facing surface over one dispatch coordinator.
 *
 * @packageDocumentation
 */

import { DEFAULT_CONFIG, type Config } from '../config/index.js';
import {
  InvocationRecorder,
  assertArity,
  type InvocationRecord,
  type MethodIdentity,
} from '../invocation/index.js';
import {
  createDefaultChain,
  type MarshalingChain,
  type NativeFrame,
} from '../marshaling/index.js';
import { InvocationPattern, type MatcherOverrides } from '../matching/index.js';
import { StubbingRegistry, type StubEntry } from '../stubbing/index.js';
import { Logger } from '../utils/logger.js';
import { boxAs, describeTag, unbox } from '../values/index.js';
import {
  VerificationEngine,
  times,
  type CountPredicate,
  type VerificationResult,
} from '../verification/index.js';
import { DispatchCoordinator } from './coordinator.js';
import { OngoingStubbing, type VoidStubbing } from './ongoing.js';
import { throwingReporter, type FailureReporter, type SourceLocation } from './reporter.js';

/**
 * Raised when stubbing or verifying through a disarmed substitute.
 */
export class SubstituteDisarmedError extends Error {
  /** Name of the substitute. */
  public readonly substitute: string;
  /** The attempted operation. */
  public readonly operation: string;

  /**
   * Creates a new SubstituteDisarmedError.
   *
   * @param substitute - Name of the substitute.
   * @param operation - The attempted operation, e.g. `given`.
   */
  constructor(substitute: string, operation: string) {
    super(`Cannot ${operation} through disarmed substitute '${substitute}'`);
    this.name = 'SubstituteDisarmedError';
    this.substitute = substitute;
    this.operation = operation;
  }
}

/**
 * Raised when `givenVoid` is used for a method that returns a value.
 */
export class NonVoidMethodError extends Error {
  /** Name of the method. */
  public readonly method: string;

  constructor(method: MethodIdentity) {
    super(`'${method.name}' returns ${describeTag(method.returnType)}; stub it with given()`);
    this.name = 'NonVoidMethodError';
    this.method = method.name;
  }
}

/**
 * Options for creating a substitute.
 */
export interface SubstituteOptions {
  /**
   * Name used in logs and errors.
   * @defaultValue 'substitute'
   */
  readonly name?: string;
  /** Effective configuration; defaults apply when omitted. */
  readonly config?: Config;
  /** Logger; built from the logging configuration when omitted. */
  readonly logger?: Logger;
  /** Marshaling chain; built from the marshaling configuration when omitted. */
  readonly chain?: MarshalingChain;
  /** Receiver of failed verifications; throws by default. */
  readonly reporter?: FailureReporter;
}

/**
 * Options for one verification.
 */
export interface VerifyOptions {
  /** Matchers for specific argument positions. */
  readonly overrides?: MatcherOverrides;
  /** Where the verification was written, passed to the reporter. */
  readonly location?: SourceLocation;
}

/**
 * A stand-in for a collaborator. Intercepted calls arrive through
 * `dispatch` (or `call`); tests stub with `given` and check with `verify`.
 *
 * @example
 * ```typescript
 * const objectAtIndex = defineMethod('objectAtIndex:', { args: ['uint64'], returns: 'object' });
 * const list = createSubstitute({ name: 'list' });
 *
 * list.given(objectAtIndex, [0]).willReturn('first');
 * list.call(objectAtIndex, 0); // 'first'
 * list.call(objectAtIndex, 1); // null
 * list.verify(objectAtIndex, [0], times(1));
 * ```
 */
export class Substitute {
  readonly name: string;
  private readonly chain: MarshalingChain;
  private readonly recorder = new InvocationRecorder();
  private readonly registry: StubbingRegistry;
  private readonly engine: VerificationEngine;
  private readonly coordinator: DispatchCoordinator;
  private readonly reporter: FailureReporter;

  constructor(options: SubstituteOptions = {}) {
    const config = options.config ?? DEFAULT_CONFIG;
    this.name = options.name ?? 'substitute';
    const logger = (
      options.logger ??
      new Logger({ component: config.logging.component, debugMode: config.logging.debug })
    ).child(this.name);

    this.chain = options.chain ?? createDefaultChain({ byteOrder: config.marshaling.byte_order });
    this.reporter = options.reporter ?? throwingReporter;
    this.registry = new StubbingRegistry({ logger: logger.child('stubbing') });
    this.engine = new VerificationEngine(this.recorder, {
      logger: logger.child('verification'),
      maxListedInvocations: config.verification.max_listed_invocations,
    });
    this.coordinator = new DispatchCoordinator({
      target: this,
      chain: this.chain,
      recorder: this.recorder,
      registry: this.registry,
      logger: logger.child('dispatch'),
    });
  }

  /**
   * Handles an intercepted call on a native frame.
   *
   * @throws MismatchedArityError if the frame's arity differs from the method's.
   */
  dispatch(method: MethodIdentity, frame: NativeFrame): void {
    this.coordinator.dispatch(method, frame);
  }

  /**
   * Calls a method with JavaScript arguments: builds the frame, dispatches
   * it and decodes the return slot. Integers come back as `bigint`, structs
   * as `Uint8Array` and void as `undefined`.
   *
   * @throws MismatchedArityError if the argument count differs from the arity.
   * @throws BoxingError if an argument cannot represent its declared type.
   */
  call(method: MethodIdentity, ...args: unknown[]): unknown {
    assertArity(method, args.length);
    const boxed = method.argumentTypes.map((tag, index) => boxAs(tag, args[index]));
    const frame = this.chain.frameFor(method.argumentTypes, boxed);
    this.dispatch(method, frame);
    return unbox(this.chain.readReturn(frame, method.returnType));
  }

  /**
   * Starts stubbing calls matching `args`. Literal arguments match by
   * equality; matchers and `overrides` match by predicate.
   *
   * @throws SubstituteDisarmedError once disarmed.
   * @throws MismatchedArityError if `args` does not fit the arity.
   * @throws InvalidMatcherPositionError for an override outside the arity.
   */
  given(
    method: MethodIdentity,
    args: readonly unknown[] = [],
    overrides?: MatcherOverrides
  ): OngoingStubbing {
    this.assertArmed('stub');
    return new OngoingStubbing(this.registry, InvocationPattern.of(method, args, overrides), () => {
      this.assertArmed('stub');
    });
  }

  /**
   * `given` for a method that returns nothing.
   *
   * @throws NonVoidMethodError if the method returns a value.
   */
  givenVoid(
    method: MethodIdentity,
    args: readonly unknown[] = [],
    overrides?: MatcherOverrides
  ): VoidStubbing {
    if (method.returnType !== 'void') {
      throw new NonVoidMethodError(method);
    }
    return this.given(method, args, overrides);
  }

  /**
   * Counts the recorded calls matching `args` and checks the count. A failed
   * verification goes to the reporter and is also returned.
   *
   * @param predicate - Expected count range; exactly once by default.
   * @throws SubstituteDisarmedError once disarmed.
   */
  verify(
    method: MethodIdentity,
    args: readonly unknown[] = [],
    predicate: CountPredicate = times(1),
    options: VerifyOptions = {}
  ): VerificationResult {
    this.assertArmed('verify');
    const pattern = InvocationPattern.of(method, args, options.overrides);
    const result = this.engine.verify(pattern, predicate);
    if (!result.passed) {
      this.reporter.report(result.failure, options.location);
    }
    return result;
  }

  /** Every recorded call, in call order. */
  get invocations(): readonly InvocationRecord[] {
    return this.recorder.invocations;
  }

  /** Registered stubs, oldest first. */
  get stubs(): readonly StubEntry[] {
    return this.registry.stubs;
  }

  /** False once disarmed. */
  get isArmed(): boolean {
    return this.coordinator.isArmed;
  }

  /**
   * Discards the log and every stub. Further calls are answered with
   * defaults and not recorded.
   */
  disarm(): void {
    this.coordinator.disarm();
  }

  private assertArmed(operation: string): void {
    if (!this.coordinator.isArmed) {
      throw new SubstituteDisarmedError(this.name, operation);
    }
  }
}

/**
 * Creates a substitute.
 */
export function createSubstitute(options: SubstituteOptions = {}): Substitute {
  return new Substitute(options);
}
