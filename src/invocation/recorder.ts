/**
 * Invocation recorder: the append-only call log of one substitute.
 *
 * @packageDocumentation
 */

import type { BoxedValue } from '../values/index.js';
import { sameMethod, type MethodIdentity } from './method.js';
import { InvocationRecord } from './record.js';

/**
 * Append-only, ordered log of invocation records.
 *
 * Readers always receive a frozen snapshot, so a reentrant call appending
 * while a caller iterates never disturbs that iteration.
 *
 * @example
 * ```typescript
 * const recorder = new InvocationRecorder();
 * recorder.record(list, addObject, [box.object('once')]);
 * recorder.invocations.length; // 1
 * ```
 */
export class InvocationRecorder {
  private log: InvocationRecord[] = [];
  private nextSequence = 0;

  /**
   * Creates a record for a call and appends it.
   *
   * @returns The appended record.
   */
  record(target: unknown, method: MethodIdentity, args: readonly BoxedValue[]): InvocationRecord {
    const record = new InvocationRecord(target, method, args, this.nextSequence);
    this.nextSequence += 1;
    this.log.push(record);
    return record;
  }

  /** Snapshot of every record, in call order. */
  get invocations(): readonly InvocationRecord[] {
    return Object.freeze([...this.log]);
  }

  /** Snapshot of the records of one method, in call order. */
  invocationsOf(method: MethodIdentity): readonly InvocationRecord[] {
    return Object.freeze(this.log.filter((record) => sameMethod(record.method, method)));
  }

  /** Number of records. */
  get size(): number {
    return this.log.length;
  }

  /**
   * Removes every record. Sequence numbers restart at zero.
   */
  reset(): void {
    this.log = [];
    this.nextSequence = 0;
  }
}
