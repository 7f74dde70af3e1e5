import { describe, it, expect } from 'vitest';
import {
  VERSION,
  anything,
  createSubstitute,
  defineMethod,
  times,
} from './index.js';

describe('understudy', () => {
  describe('VERSION', () => {
    it('should follow semver format', () => {
      expect(VERSION).toMatch(/^\d+\.\d+\.\d+$/);
    });

    it('should match package version', () => {
      expect(VERSION).toBe('0.1.0');
    });
  });

  describe('public surface', () => {
    it('should stub, call and verify through the package entry point', () => {
      const describeItem = defineMethod('describeItem:', { args: ['object'], returns: 'object' });
      const catalog = createSubstitute({ name: 'catalog' });

      catalog.given(describeItem, [anything()]).willReturn('an item');

      expect(catalog.call(describeItem, { sku: 'A-1' })).toBe('an item');
      expect(catalog.verify(describeItem, [anything()], times(1))).toEqual({
        passed: true,
        count: 1,
      });
    });
  });
});
