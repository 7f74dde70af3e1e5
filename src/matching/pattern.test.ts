import { describe, it, expect } from 'vitest';
import { InvocationRecord, defineMethod, type MethodIdentity } from '../invocation/index.js';
import { box, unbox, type BoxedValue } from '../values/index.js';
import { ArgumentCaptor } from './captor.js';
import { anything } from './equality.js';
import { InvocationPattern } from './pattern.js';

const objectAtIndex = defineMethod('objectAtIndex:', { args: ['uint64'], returns: 'object' });
const addObject = defineMethod('addObject:', { args: ['object'] });

function callOf(method: MethodIdentity, arg: BoxedValue): InvocationRecord {
  return new InvocationRecord('list', method, [arg], 0);
}

describe('InvocationPattern', () => {
  describe('matches', () => {
    it('should match calls of the same method whose arguments all match', () => {
      const pattern = InvocationPattern.of(objectAtIndex, [0]);

      expect(pattern.matches(callOf(objectAtIndex, box.uint64(0)))).toBe(true);
      expect(pattern.matches(callOf(objectAtIndex, box.uint64(1)))).toBe(false);
    });

    it('should not match calls of another method', () => {
      const pattern = InvocationPattern.of(addObject, [anything()]);
      expect(pattern.matches(callOf(objectAtIndex, box.uint64(0)))).toBe(false);
    });

    it('should not capture while matching', () => {
      const captor = new ArgumentCaptor();
      const pattern = InvocationPattern.of(addObject, [captor]);

      pattern.matches(callOf(addObject, box.object('once')));

      expect(captor.allValues).toEqual([]);
    });
  });

  describe('captureFrom', () => {
    it('should hand each argument to the captor at its position', () => {
      const captor = new ArgumentCaptor();
      const pattern = InvocationPattern.of(addObject, [captor]);

      pattern.captureFrom(callOf(addObject, box.object('once')));
      pattern.captureFrom(callOf(addObject, box.object('twice')));

      expect(captor.allValues.map(unbox)).toEqual(['once', 'twice']);
    });
  });

  describe('equivalent', () => {
    it('should treat equal literals of the same method as equivalent', () => {
      expect(
        InvocationPattern.of(addObject, ['x']).equivalent(InvocationPattern.of(addObject, ['x']))
      ).toBe(true);
      expect(
        InvocationPattern.of(addObject, ['x']).equivalent(InvocationPattern.of(addObject, ['y']))
      ).toBe(false);
    });

    it('should treat the same matcher instance as equivalent', () => {
      expect(
        InvocationPattern.of(objectAtIndex, [0], { 0: anything() }).equivalent(
          InvocationPattern.of(objectAtIndex, [5], { 0: anything() })
        )
      ).toBe(true);
    });

    it('should treat distinct matcher instances as different', () => {
      expect(
        InvocationPattern.of(addObject, [new ArgumentCaptor()]).equivalent(
          InvocationPattern.of(addObject, [new ArgumentCaptor()])
        )
      ).toBe(false);
    });
  });

  it('should describe itself from its matchers', () => {
    expect(InvocationPattern.of(addObject, ['twice']).describe()).toBe("addObject:('twice')");
    expect(InvocationPattern.of(objectAtIndex, [0], { 0: anything() }).describe()).toBe(
      'objectAtIndex:(anything)'
    );
  });
});
