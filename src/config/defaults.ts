/**
 * Default configuration values for understudy.toml.
 *
 * @packageDocumentation
 */

import type { Config, LoggingConfig, MarshalingConfig, VerificationConfig } from './types.js';

/**
 * Default logging configuration: debug tracing off.
 */
export const DEFAULT_LOGGING: LoggingConfig = {
  debug: false,
  component: 'understudy',
};

/**
 * Default marshaling configuration.
 */
export const DEFAULT_MARSHALING: MarshalingConfig = {
  byte_order: 'little',
};

/**
 * Default verification configuration.
 */
export const DEFAULT_VERIFICATION: VerificationConfig = {
  max_listed_invocations: Infinity,
};

/**
 * Complete default configuration.
 */
export const DEFAULT_CONFIG: Config = {
  logging: DEFAULT_LOGGING,
  marshaling: DEFAULT_MARSHALING,
  verification: DEFAULT_VERIFICATION,
};
