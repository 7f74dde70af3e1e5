import { describe, it, expect } from 'vitest';
import {
  InvocationRecorder,
  MismatchedArityError,
  defineMethod,
} from '../invocation/index.js';
import { EMPTY_SLOT, NativeFrame, createDefaultChain } from '../marshaling/index.js';
import { InvocationPattern } from '../matching/index.js';
import { StubbingRegistry, computing, returning, throwing } from '../stubbing/index.js';
import { box, unbox } from '../values/index.js';
import { DispatchCoordinator } from './coordinator.js';

const chain = createDefaultChain();
const objectAtIndex = defineMethod('objectAtIndex:', { args: ['uint64'], returns: 'object' });
const count = defineMethod('count', { returns: 'uint64' });

function setup(): {
  coordinator: DispatchCoordinator;
  recorder: InvocationRecorder;
  registry: StubbingRegistry;
} {
  const recorder = new InvocationRecorder();
  const registry = new StubbingRegistry();
  const coordinator = new DispatchCoordinator({ target: 'list', chain, recorder, registry });
  return { coordinator, recorder, registry };
}

function frameAt(index: number): NativeFrame {
  return chain.frameFor(['uint64'], [box.uint64(index)]);
}

describe('DispatchCoordinator', () => {
  it('should record the call and write the stubbed return value', () => {
    const { coordinator, recorder, registry } = setup();
    registry.register(InvocationPattern.of(objectAtIndex, [0]), returning(box.object('first')));
    const frame = frameAt(0);

    coordinator.dispatch(objectAtIndex, frame);

    expect(frame.returnValue).toEqual({ kind: 'reference', value: 'first' });
    expect(recorder.size).toBe(1);
    const record = recorder.invocations[0];
    expect(record?.target).toBe('list');
    expect(record?.returnValue === undefined ? 'unset' : unbox(record.returnValue)).toBe('first');
  });

  it('should write the zero value when nothing is stubbed', () => {
    const { coordinator, recorder } = setup();
    const objectFrame = frameAt(2);
    const countFrame = new NativeFrame([]);

    coordinator.dispatch(objectAtIndex, objectFrame);
    coordinator.dispatch(count, countFrame);

    expect(objectFrame.returnValue).toEqual({ kind: 'reference', value: null });
    expect(unbox(chain.readReturn(countFrame, 'uint64'))).toBe(0n);
    expect(recorder.size).toBe(2);
  });

  it('should raise the stubbed error unchanged after recording the call', () => {
    const { coordinator, recorder, registry } = setup();
    const failure = new RangeError('index 1 beyond bounds');
    registry.register(InvocationPattern.of(objectAtIndex, [1]), throwing(failure));

    let raised: unknown;
    try {
      coordinator.dispatch(objectAtIndex, frameAt(1));
    } catch (error) {
      raised = error;
    }

    expect(raised).toBe(failure);
    expect(recorder.size).toBe(1);
    expect(recorder.invocations[0]?.returnValue).toBeUndefined();
  });

  it('should box the raw result of a computed answer', () => {
    const { coordinator, registry } = setup();
    registry.register(
      InvocationPattern.of(objectAtIndex, [4]),
      computing((record) => `item ${String(unbox(record.argument(0)))}`)
    );
    const frame = frameAt(4);

    coordinator.dispatch(objectAtIndex, frame);

    expect(frame.returnValue).toEqual({ kind: 'reference', value: 'item 4' });
  });

  it('should record reentrant calls after their parent', () => {
    const { coordinator, recorder, registry } = setup();
    registry.register(
      InvocationPattern.of(objectAtIndex, [0]),
      computing(() => {
        coordinator.dispatch(count, new NativeFrame([]));
        return 'outer';
      })
    );

    coordinator.dispatch(objectAtIndex, frameAt(0));

    expect(recorder.invocations.map((record) => [record.sequence, record.method.name])).toEqual([
      [0, 'objectAtIndex:'],
      [1, 'count'],
    ]);
  });

  it('should reject a frame whose arity differs from the method', () => {
    const { coordinator, recorder } = setup();

    expect(() => coordinator.dispatch(objectAtIndex, new NativeFrame([]))).toThrow(
      MismatchedArityError
    );
    expect(recorder.size).toBe(0);
  });

  describe('disarm', () => {
    it('should clear state and answer defaults without recording', () => {
      const { coordinator, recorder, registry } = setup();
      registry.register(InvocationPattern.of(objectAtIndex, [0]), returning(box.object('first')));
      coordinator.dispatch(objectAtIndex, frameAt(0));

      coordinator.disarm();
      const frame = frameAt(0);
      coordinator.dispatch(objectAtIndex, frame);

      expect(coordinator.isArmed).toBe(false);
      expect(recorder.size).toBe(0);
      expect(registry.size).toBe(0);
      expect(frame.returnValue).toEqual({ kind: 'reference', value: null });
    });

    it('should leave void calls with an empty return slot', () => {
      const { coordinator } = setup();
      const removeAll = defineMethod('removeAllObjects');
      coordinator.disarm();
      const frame = new NativeFrame([]);

      coordinator.dispatch(removeAll, frame);

      expect(frame.returnValue).toBe(EMPTY_SLOT);
    });
  });
});
