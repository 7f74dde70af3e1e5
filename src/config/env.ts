/**
 * Environment variable overrides for configuration.
 *
 * Provides support for UNDERSTUDY_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { isByteOrder } from './parser.js';
import type { Config, PartialConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * One supported environment variable: how it is documented and how its
 * value lands in the partial configuration.
 */
interface EnvVarMapping {
  readonly description: string;
  readonly type: 'string' | 'number' | 'boolean' | "'little' | 'big'";
  readonly apply: (overrides: PartialConfig, value: string, envVar: string) => void;
}

function setLoggingDebug(overrides: PartialConfig, value: string, envVar: string): void {
  overrides.logging = { ...overrides.logging, debug: coerceToBoolean(value, envVar) };
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: UNDERSTUDY_<SECTION>_<FIELD> maps to config.<section>.<field>.
 * UNDERSTUDY_DEBUG is a shortcut for UNDERSTUDY_LOGGING_DEBUG.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  UNDERSTUDY_DEBUG: {
    description: 'Enable debug logging (shortcut for UNDERSTUDY_LOGGING_DEBUG)',
    type: 'boolean',
    apply: setLoggingDebug,
  },
  UNDERSTUDY_LOGGING_DEBUG: {
    description: 'Enable debug logging of every recorded and resolved invocation',
    type: 'boolean',
    apply: setLoggingDebug,
  },
  UNDERSTUDY_LOGGING_COMPONENT: {
    description: 'Override the component name written on log entries',
    type: 'string',
    apply: (overrides, value) => {
      overrides.logging = { ...overrides.logging, component: value };
    },
  },
  UNDERSTUDY_MARSHALING_BYTE_ORDER: {
    description: 'Override the byte order of native frame slots',
    type: "'little' | 'big'",
    apply: (overrides, value, envVar) => {
      const trimmed = value.trim().toLowerCase();
      if (!isByteOrder(trimmed)) {
        throw new EnvCoercionError(envVar, value, "'little' | 'big'");
      }
      overrides.marshaling = { ...overrides.marshaling, byte_order: trimmed };
    },
  },
  UNDERSTUDY_VERIFICATION_MAX_LISTED_INVOCATIONS: {
    description: 'Override the number of invocations listed in a verification failure',
    type: 'number',
    apply: (overrides, value, envVar) => {
      overrides.verification = {
        ...overrides.verification,
        max_listed_invocations: coerceToNumber(value, envVar),
      };
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ UNDERSTUDY_DEBUG: 'true' });
 * result.overrides; // { logging: { debug: true } }
 * result.appliedVars; // ['UNDERSTUDY_DEBUG']
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 */
function mergeConfig(base: Config, partial: PartialConfig): Config {
  return {
    logging: {
      ...base.logging,
      ...partial.logging,
    },
    marshaling: {
      ...base.marshaling,
      ...partial.marshaling,
    },
    verification: {
      ...base.verification,
      ...partial.verification,
    },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function applyEnvOverrides(config: Config, env: EnvRecord = process.env): Config {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
