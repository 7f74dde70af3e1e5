/**
 * Dispatch coordinator.
 *
 * Entry point for every intercepted call: decodes the frame, records the
 * call, resolves an answer and applies it to the frame's return slot.
 *
 * @packageDocumentation
 */

import {
  MismatchedArityError,
  arityOf,
  type InvocationRecord,
  type InvocationRecorder,
  type MethodIdentity,
} from '../invocation/index.js';
import type { MarshalingChain, NativeFrame } from '../marshaling/index.js';
import type { StubbingRegistry } from '../stubbing/index.js';
import { Logger } from '../utils/logger.js';
import { boxAs, describeBoxed, zeroValue, type BoxedValue } from '../values/index.js';

/**
 * Collaborators of a coordinator, all owned by one substitute.
 */
export interface DispatchCoordinatorOptions {
  /** Identity stored on every record. */
  readonly target: unknown;
  readonly chain: MarshalingChain;
  readonly recorder: InvocationRecorder;
  readonly registry: StubbingRegistry;
  readonly logger?: Logger;
}

/**
 * Coordinates recording and answering of intercepted calls for one
 * substitute.
 *
 * The record of a call is appended before its answer runs, so calls made
 * from inside a computed answer are recorded after their parent.
 */
export class DispatchCoordinator {
  private readonly target: unknown;
  private readonly chain: MarshalingChain;
  private readonly recorder: InvocationRecorder;
  private readonly registry: StubbingRegistry;
  private readonly logger: Logger;
  private armed = true;

  constructor(options: DispatchCoordinatorOptions) {
    this.target = options.target;
    this.chain = options.chain;
    this.recorder = options.recorder;
    this.registry = options.registry;
    this.logger = options.logger ?? new Logger({ component: 'DispatchCoordinator' });
  }

  /** False once disarmed. */
  get isArmed(): boolean {
    return this.armed;
  }

  /**
   * Handles one intercepted call, writing the return slot of `frame`.
   *
   * @throws MismatchedArityError if the frame's arity differs from the method's.
   * @throws UnsupportedTypeError if a declared type has no converter.
   * @throws The configured error of a `throw` answer, unchanged.
   */
  dispatch(method: MethodIdentity, frame: NativeFrame): void {
    if (frame.arity !== arityOf(method)) {
      throw new MismatchedArityError(method, frame.arity);
    }

    if (!this.armed) {
      this.writeDefault(method, frame, undefined);
      return;
    }

    const args = method.argumentTypes.map((tag, index) =>
      this.chain.readArgument(frame, index, tag)
    );
    const record = this.recorder.record(this.target, method, args);
    this.logger.debug('invocation_recorded', {
      invocation: record.describe(),
      sequence: record.sequence,
    });

    const answer = this.registry.resolve(record);
    if (answer === undefined) {
      this.writeDefault(method, frame, record);
      return;
    }

    switch (answer.kind) {
      case 'return':
        this.complete(frame, record, answer.value);
        return;
      case 'throw':
        this.logger.debug('stubbed_error_raised', {
          invocation: record.describe(),
          error: answer.error instanceof Error ? answer.error.message : String(answer.error),
        });
        throw answer.error;
      case 'compute': {
        const result = answer.compute(record);
        // Void methods discard whatever the computation returns.
        const value =
          method.returnType === 'void' ? zeroValue('void') : boxAs(method.returnType, result);
        this.complete(frame, record, value);
        return;
      }
    }
  }

  /**
   * Clears the log and every stub, then answers all further calls with
   * defaults without recording them.
   */
  disarm(): void {
    const discarded = { invocations: this.recorder.size, stubs: this.registry.size };
    this.recorder.reset();
    this.registry.clear();
    this.armed = false;
    this.logger.debug('substitute_disarmed', discarded);
  }

  private complete(frame: NativeFrame, record: InvocationRecord, value: BoxedValue): void {
    this.chain.writeReturn(frame, record.method.returnType, value);
    record.setReturnValue(value);
  }

  private writeDefault(
    method: MethodIdentity,
    frame: NativeFrame,
    record: InvocationRecord | undefined
  ): void {
    const value = zeroValue(method.returnType);
    this.chain.writeReturn(frame, method.returnType, value);
    if (record !== undefined) {
      record.setReturnValue(value);
      this.logger.debug('default_answer_applied', {
        invocation: record.describe(),
        value: describeBoxed(value),
      });
    }
  }
}
