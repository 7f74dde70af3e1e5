import { describe, it, expect } from 'vitest';
import type { VerificationFailure } from '../verification/index.js';
import { times } from '../verification/index.js';
import { CollectingReporter, VerificationFailureError, throwingReporter } from './reporter.js';

const failure: VerificationFailure = {
  method: 'count',
  pattern: 'count()',
  expected: times(1),
  expectedDescription: 'exactly 1 time',
  actual: 0,
  invocations: [],
  description: "Expected count() to be called exactly 1 time, but was called 0 times.\nNo invocations of 'count' were recorded.",
};

describe('throwingReporter', () => {
  it('should throw a VerificationFailureError carrying the failure and location', () => {
    try {
      throwingReporter.report(failure, { file: 'cart.test.ts', line: 40 });
      expect.unreachable('report should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(VerificationFailureError);
      if (error instanceof VerificationFailureError) {
        expect(error.name).toBe('VerificationFailureError');
        expect(error.failure).toBe(failure);
        expect(error.location).toEqual({ file: 'cart.test.ts', line: 40 });
        expect(error.message.split('\n')[0]).toBe(
          'cart.test.ts:40: Expected count() to be called exactly 1 time, but was called 0 times.'
        );
      }
    }
  });

  it('should use the bare description without a location', () => {
    expect(new VerificationFailureError(failure).message).toBe(failure.description);
  });
});

describe('CollectingReporter', () => {
  it('should keep failures until cleared', () => {
    const reporter = new CollectingReporter();

    reporter.report(failure);
    reporter.report(failure, { file: 'cart.test.ts', line: 41 });

    expect(reporter.failures.map((entry) => entry.location?.line)).toEqual([undefined, 41]);

    reporter.clear();
    expect(reporter.failures).toEqual([]);
  });
});
