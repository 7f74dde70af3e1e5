/**
 * Stubbing registry.
 *
 * Maps invocation patterns to ordered answer queues:
 * - the most recently registered matching pattern wins
 * - within a pattern, answers are consumed in order and the last one repeats
 *
 * @packageDocumentation
 */

import type { InvocationRecord } from '../invocation/index.js';
import type { InvocationPattern } from '../matching/index.js';
import { Logger } from '../utils/logger.js';
import { assertBoxedMatchesTag } from '../values/index.js';
import { describeAnswer, type Answer } from './answers.js';

/**
 * State of a stub entry: more than one queued answer, or a single answer
 * that repeats for every further call.
 */
export type StubEntryState = 'unconsumed' | 'repeating';

/**
 * A pattern and its queue of answers.
 */
export class StubEntry {
  private readonly queue: Answer[];

  /**
   * @param pattern - The pattern calls are matched against.
   * @param first - The first queued answer.
   */
  constructor(
    readonly pattern: InvocationPattern,
    first: Answer
  ) {
    this.queue = [first];
  }

  /** Queues another consecutive answer. */
  append(answer: Answer): void {
    this.queue.push(answer);
  }

  /**
   * Takes the next answer: the head is removed unless it is the only one
   * left, in which case it is reused.
   */
  next(): Answer {
    const head = this.queue[0];
    if (head === undefined) {
      throw new Error(`Stub for '${this.pattern.method.name}' has no answers`);
    }
    if (this.queue.length > 1) {
      this.queue.shift();
    }
    return head;
  }

  /** Current state. */
  get state(): StubEntryState {
    return this.queue.length > 1 ? 'unconsumed' : 'repeating';
  }

  /** Answers still queued, head first. */
  get remaining(): readonly Answer[] {
    return Object.freeze([...this.queue]);
  }
}

/**
 * Options for creating a StubbingRegistry.
 */
export interface StubbingRegistryOptions {
  /** Logger for registration and resolution events. */
  readonly logger?: Logger;
}

/**
 * Registry of stub entries for one substitute.
 *
 * @example
 * ```typescript
 * const registry = new StubbingRegistry();
 * registry.register(InvocationPattern.of(someMethod, ['x']), throwing(new Error('boom')));
 * registry.register(InvocationPattern.of(someMethod, ['x']), returning(box.object('foo')));
 * registry.resolve(record); // throw, then return 'foo' for every later call
 * ```
 */
export class StubbingRegistry {
  /** Oldest first; the most recently registered entry is last. */
  private entries: StubEntry[] = [];
  private readonly logger: Logger;

  constructor(options: StubbingRegistryOptions = {}) {
    this.logger = options.logger ?? new Logger({ component: 'StubbingRegistry' });
  }

  /**
   * Registers an answer. If an equivalent pattern is already registered the
   * answer is queued after its existing answers and the entry becomes the
   * most recently registered; otherwise a new entry is created.
   *
   * @throws BoxedTypeMismatchError if a fixed return value does not conform
   *   to the method's return type.
   */
  register(pattern: InvocationPattern, answer: Answer): StubEntry {
    if (answer.kind === 'return') {
      assertBoxedMatchesTag(pattern.method.returnType, answer.value);
    }

    const index = this.entries.findIndex((entry) => entry.pattern.equivalent(pattern));
    const existing = this.entries[index];
    let entry: StubEntry;
    if (existing !== undefined) {
      existing.append(answer);
      this.entries.splice(index, 1);
      entry = existing;
    } else {
      entry = new StubEntry(pattern, answer);
    }
    this.entries.push(entry);

    this.logger.debug('stub_registered', {
      pattern: pattern.describe(),
      answer: describeAnswer(answer),
      queued: entry.remaining.length,
    });
    return entry;
  }

  /**
   * Resolves the answer for a call: the most recently registered matching
   * entry supplies its next answer.
   *
   * @returns The answer, or `undefined` when no entry matches.
   */
  resolve(record: InvocationRecord): Answer | undefined {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      const entry = this.entries[i];
      if (entry !== undefined && entry.pattern.matches(record)) {
        const answer = entry.next();
        this.logger.debug('stub_resolved', {
          invocation: record.describe(),
          pattern: entry.pattern.describe(),
          answer: describeAnswer(answer),
        });
        return answer;
      }
    }
    return undefined;
  }

  /** Snapshot of the entries, oldest first. */
  get stubs(): readonly StubEntry[] {
    return Object.freeze([...this.entries]);
  }

  /** Number of entries. */
  get size(): number {
    return this.entries.length;
  }

  /** Removes every entry. */
  clear(): void {
    this.entries = [];
  }
}
