/**
 * Configuration module.
 *
 * Parses understudy.toml, applies UNDERSTUDY_* environment overrides and
 * validates the result.
 *
 * @packageDocumentation
 */

export { BYTE_ORDERS, ConfigParseError, getDefaultConfig, isByteOrder, parseConfig } from './parser.js';
export type {
  Config,
  LoggingConfig,
  MarshalingConfig,
  PartialConfig,
  VerificationConfig,
} from './types.js';

export {
  DEFAULT_CONFIG,
  DEFAULT_LOGGING,
  DEFAULT_MARSHALING,
  DEFAULT_VERIFICATION,
} from './defaults.js';

export { ConfigValidationError, assertConfigValid, validateConfig } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';

export {
  EnvCoercionError,
  applyEnvOverrides,
  getEnvVarDocumentation,
  readEnvOverrides,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';

export { DEFAULT_CONFIG_PATH, loadConfig } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
