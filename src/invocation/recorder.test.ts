import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { box, unbox } from '../values/index.js';
import { defineMethod } from './method.js';
import { InvocationRecorder } from './recorder.js';

const addObject = defineMethod('addObject:', { args: ['object'] });
const count = defineMethod('count', { returns: 'uint64' });

describe('InvocationRecorder', () => {
  it('should append records in call order with increasing sequence numbers', () => {
    const recorder = new InvocationRecorder();

    const first = recorder.record('list', addObject, [box.object('a')]);
    const second = recorder.record('list', count, []);

    expect(first.sequence).toBe(0);
    expect(second.sequence).toBe(1);
    expect(recorder.invocations).toEqual([first, second]);
    expect(recorder.size).toBe(2);
  });

  it('should filter records by method', () => {
    const recorder = new InvocationRecorder();
    recorder.record('list', addObject, [box.object('a')]);
    recorder.record('list', count, []);
    recorder.record('list', addObject, [box.object('b')]);

    expect(recorder.invocationsOf(addObject).map((record) => record.describe())).toEqual([
      "addObject:('a')",
      "addObject:('b')",
    ]);
  });

  it('should return snapshots that later calls do not change', () => {
    const recorder = new InvocationRecorder();
    recorder.record('list', count, []);
    const snapshot = recorder.invocations;

    recorder.record('list', count, []);

    expect(snapshot).toHaveLength(1);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('should restart sequence numbers after reset', () => {
    const recorder = new InvocationRecorder();
    recorder.record('list', count, []);
    recorder.reset();

    expect(recorder.size).toBe(0);
    expect(recorder.record('list', count, []).sequence).toBe(0);
  });

  it('should record every call in order (property-based)', () => {
    fc.assert(
      fc.property(fc.array(fc.string(), { maxLength: 30 }), (values) => {
        const recorder = new InvocationRecorder();
        for (const value of values) {
          recorder.record('list', addObject, [box.object(value)]);
        }
        expect(recorder.invocations.map((record) => unbox(record.argument(0)))).toEqual(values);
        expect(recorder.invocations.map((record) => record.sequence)).toEqual(values.map((_, i) => i));
      })
    );
  });
});
