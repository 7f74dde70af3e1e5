import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { InvocationRecorder, defineMethod } from '../invocation/index.js';
import { ArgumentCaptor, InvocationPattern } from '../matching/index.js';
import { box, unbox } from '../values/index.js';
import { atLeastOnce, never, times } from './count.js';
import { VerificationEngine } from './engine.js';

const addObject = defineMethod('addObject:', { args: ['object'] });
const count = defineMethod('count', { returns: 'uint64' });

function recorderWith(...values: string[]): InvocationRecorder {
  const recorder = new InvocationRecorder();
  for (const value of values) {
    recorder.record('list', addObject, [box.object(value)]);
  }
  return recorder;
}

describe('VerificationEngine', () => {
  it('should count matching invocations against the predicate', () => {
    const engine = new VerificationEngine(recorderWith('once', 'twice', 'twice'));

    expect(engine.verify(InvocationPattern.of(addObject, ['once']), times(1))).toEqual({
      passed: true,
      count: 1,
    });
    expect(engine.verify(InvocationPattern.of(addObject, ['twice']), times(2))).toEqual({
      passed: true,
      count: 2,
    });
    expect(engine.verify(InvocationPattern.of(addObject, ['never']), never())).toEqual({
      passed: true,
      count: 0,
    });
  });

  it('should describe a failed verification', () => {
    const engine = new VerificationEngine(recorderWith('once', 'twice', 'twice'));

    const result = engine.verify(InvocationPattern.of(addObject, ['twice']), times(1));

    expect(result.passed).toBe(false);
    if (!result.passed) {
      expect(result.count).toBe(2);
      expect(result.failure.method).toBe('addObject:');
      expect(result.failure.pattern).toBe("addObject:('twice')");
      expect(result.failure.expectedDescription).toBe('exactly 1 time');
      expect(result.failure.actual).toBe(2);
      expect(result.failure.invocations.map((invocation) => invocation.matched)).toEqual([
        false,
        true,
        true,
      ]);
      expect(result.failure.description).toBe(
        [
          "Expected addObject:('twice') to be called exactly 1 time, but was called 2 times.",
          "Recorded invocations of 'addObject:':",
          "  1. addObject:('once')",
          "  2. addObject:('twice') [matched]",
          "  3. addObject:('twice') [matched]",
        ].join('\n')
      );
    }
  });

  it('should say so when the method was never called', () => {
    const recorder = new InvocationRecorder();
    recorder.record('list', count, []);
    const engine = new VerificationEngine(recorder);

    const result = engine.verify(InvocationPattern.of(addObject, ['x']), atLeastOnce());

    expect(result.passed ? '' : result.failure.description).toBe(
      [
        "Expected addObject:('x') to be called at least 1 time, but was called 0 times.",
        "No invocations of 'addObject:' were recorded.",
      ].join('\n')
    );
  });

  it('should truncate the listed invocations', () => {
    const engine = new VerificationEngine(recorderWith('a', 'b', 'c'), { maxListedInvocations: 2 });

    const result = engine.verify(InvocationPattern.of(addObject, ['z']), times(1));

    expect(result.passed ? [] : result.failure.description.split('\n').slice(1)).toEqual([
      "Recorded invocations of 'addObject:':",
      "  1. addObject:('a')",
      "  2. addObject:('b')",
      '  ... and 1 more',
    ]);
  });

  it('should capture arguments of matched invocations and accumulate across scans', () => {
    const engine = new VerificationEngine(recorderWith('a', 'b'));
    const captor = new ArgumentCaptor();
    const pattern = InvocationPattern.of(addObject, [captor]);

    engine.verify(pattern, times(2));
    engine.verify(pattern, times(2));

    expect(captor.allValues.map(unbox)).toEqual(['a', 'b', 'a', 'b']);
  });

  it('should leave the log unchanged (property-based)', () => {
    fc.assert(
      fc.property(fc.array(fc.constantFrom('a', 'b', 'c'), { maxLength: 10 }), fc.constantFrom('a', 'b', 'c'), (values, probe) => {
        const recorder = recorderWith(...values);
        const before = recorder.invocations;
        const engine = new VerificationEngine(recorder);

        const first = engine.verify(InvocationPattern.of(addObject, [probe]), atLeastOnce());
        const second = engine.verify(InvocationPattern.of(addObject, [probe]), atLeastOnce());

        expect(recorder.invocations).toEqual(before);
        expect(first.count).toBe(values.filter((value) => value === probe).length);
        expect(second.count).toBe(first.count);
      })
    );
  });
});
