import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fc from 'fast-check';
import { Logger } from './logger.js';

function captureStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('Logger', () => {
  let writeSpy: ReturnType<typeof captureStderr>;

  beforeEach(() => {
    writeSpy = captureStderr();
  });

  afterEach(() => {
    writeSpy.mockRestore();
  });

  function outputs(): string[] {
    return writeSpy.mock.calls.map((call) => String(call[0]));
  }

  function parseOutput(index: number): unknown {
    const output = outputs()[index];
    if (output === undefined) {
      throw new Error(`Expected output at index ${String(index)} but got undefined`);
    }
    return JSON.parse(output.trim());
  }

  describe('safe JSON.stringify', () => {
    it('should handle circular references without throwing', () => {
      const logger = new Logger({ component: 'TestLogger' });

      const circularObj: Record<string, unknown> = { name: 'test' };
      circularObj.self = circularObj;

      expect(() => {
        logger.info('circular_test', circularObj);
      }).not.toThrow();

      expect(outputs()).toHaveLength(1);
      expect(parseOutput(0)).toEqual({
        timestamp: expect.any(String),
        level: 'info',
        component: 'TestLogger',
        event: 'circular_test',
        serializationError: expect.any(String),
        originalData: '[unserializable]',
      });
    });

    it('should write bigint values as decimal strings', () => {
      const logger = new Logger({ component: 'TestLogger' });

      logger.info('bigint_test', { value: 18446744073709551615n });

      expect(parseOutput(0)).toMatchObject({
        event: 'bigint_test',
        data: { value: '18446744073709551615' },
      });
    });

    it('should output a single JSON line even when serialization fails', () => {
      const logger = new Logger({ component: 'TestLogger' });
      const throwing = {
        toJSON(): never {
          throw new Error('no json');
        },
      };

      logger.warn('throwing_to_json', { throwing });

      const output = outputs()[0] ?? '';
      expect(output.endsWith('\n')).toBe(true);
      expect(output.trim().split('\n')).toHaveLength(1);
      expect(parseOutput(0)).toMatchObject({ serializationError: 'no json' });
    });

    it('should handle arbitrary values without throwing (property-based)', () => {
      const logger = new Logger({ component: 'PropertyLogger' });
      fc.assert(
        fc.property(fc.dictionary(fc.string(), fc.anything({ withBigInt: true })), (data) => {
          expect(() => {
            logger.error('property_test', data);
          }).not.toThrow();
        })
      );
    });
  });

  describe('normal logging', () => {
    it('should log info messages correctly', () => {
      const logger = new Logger({ component: 'StubbingRegistry' });

      logger.info('stub_registered', { pattern: 'objectAtIndex:(0)' });

      expect(parseOutput(0)).toEqual({
        timestamp: expect.any(String),
        level: 'info',
        component: 'StubbingRegistry',
        event: 'stub_registered',
        data: { pattern: 'objectAtIndex:(0)' },
      });
    });

    it('should omit data when none is given', () => {
      const logger = new Logger({ component: 'Quiet' });

      logger.warn('nothing_attached');

      expect(parseOutput(0)).toEqual({
        timestamp: expect.any(String),
        level: 'warn',
        component: 'Quiet',
        event: 'nothing_attached',
      });
    });

    it('should not log debug messages when debugMode is false', () => {
      const logger = new Logger({ component: 'Quiet' });

      logger.debug('invocation_recorded', { sequence: 0 });

      expect(writeSpy).not.toHaveBeenCalled();
      expect(logger.isDebugEnabled).toBe(false);
    });

    it('should log debug messages when debugMode is true', () => {
      const logger = new Logger({ component: 'Chatty', debugMode: true });

      logger.debug('invocation_recorded', { sequence: 0 });

      expect(parseOutput(0)).toMatchObject({ level: 'debug', event: 'invocation_recorded' });
    });

    it('should log error messages correctly', () => {
      const logger = new Logger({ component: 'VerificationEngine' });

      logger.error('verification_failed', { actual: 2 });

      expect(parseOutput(0)).toMatchObject({
        level: 'error',
        component: 'VerificationEngine',
        data: { actual: 2 },
      });
    });
  });

  describe('child', () => {
    it('should append the name and share debug mode', () => {
      const child = new Logger({ component: 'understudy', debugMode: true }).child('list');

      child.debug('stub_resolved');

      expect(child.isDebugEnabled).toBe(true);
      expect(parseOutput(0)).toMatchObject({ component: 'understudy.list' });
    });
  });
});
