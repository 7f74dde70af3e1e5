import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { ConfigValidationError, assertConfigValid, validateConfig } from './validator.js';
import { getDefaultConfig } from './parser.js';

describe('validateConfig', () => {
  it('should accept the defaults', () => {
    expect(validateConfig(getDefaultConfig())).toEqual({ valid: true, errors: [] });
  });

  it('should reject a blank component name', () => {
    const config = getDefaultConfig();
    config.logging.component = '   ';

    expect(validateConfig(config).errors).toEqual([
      { field: 'logging.component', value: '   ', message: 'Component name must not be empty' },
    ]);
  });

  it('should reject a non-positive or fractional listing limit', () => {
    fc.assert(
      fc.property(
        fc.oneof(fc.integer({ max: 0 }), fc.integer({ min: 0, max: 100 }).map((n) => n + 0.5)),
        (limit) => {
          const config = getDefaultConfig();
          config.verification.max_listed_invocations = limit;
          const result = validateConfig(config);
          expect(result.valid).toBe(false);
          expect(result.errors[0]?.field).toBe('verification.max_listed_invocations');
        }
      )
    );
  });

  it('should accept inf as an unlimited listing limit', () => {
    const config = getDefaultConfig();
    config.verification.max_listed_invocations = Infinity;

    expect(validateConfig(config).valid).toBe(true);
  });

  it('should collect every error', () => {
    const config = getDefaultConfig();
    config.logging.component = '';
    config.verification.max_listed_invocations = 0;

    expect(validateConfig(config).errors.map((e) => e.field)).toEqual([
      'logging.component',
      'verification.max_listed_invocations',
    ]);
  });
});

describe('assertConfigValid', () => {
  it('should throw ConfigValidationError listing each failure', () => {
    const config = getDefaultConfig();
    config.verification.max_listed_invocations = -2;

    expect(() => assertConfigValid(config)).toThrow(ConfigValidationError);
    expect(() => assertConfigValid(config)).toThrow(
      'Configuration validation failed with 1 error(s):\n  - verification.max_listed_invocations: Must be a positive integer or inf, got -2'
    );
  });

  it('should not throw for a valid config', () => {
    expect(() => assertConfigValid(getDefaultConfig())).not.toThrow();
  });
});
