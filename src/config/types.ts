/**
 * Configuration types for understudy.toml parsing.
 *
 * @packageDocumentation
 */

import type { ByteOrder } from '../marshaling/index.js';

/**
 * Logging configuration.
 */
export interface LoggingConfig {
  /** Whether debug-level entries (per-invocation tracing) are written. */
  debug: boolean;
  /** Component name prefixed to every log entry. */
  component: string;
}

/**
 * Marshaling configuration for native call frames.
 */
export interface MarshalingConfig {
  /** Byte order of multi-byte primitive slots. */
  byte_order: ByteOrder;
}

/**
 * Verification failure rendering configuration.
 */
export interface VerificationConfig {
  /** Maximum number of recorded invocations listed in a failure description. */
  max_listed_invocations: number;
}

/**
 * Complete configuration object parsed from understudy.toml.
 */
export interface Config {
  /** Logging settings. */
  logging: LoggingConfig;
  /** Marshaling settings. */
  marshaling: MarshalingConfig;
  /** Verification settings. */
  verification: VerificationConfig;
}

/**
 * Partial configuration for merging with defaults.
 * All fields are optional.
 */
export interface PartialConfig {
  logging?: Partial<LoggingConfig>;
  marshaling?: Partial<MarshalingConfig>;
  verification?: Partial<VerificationConfig>;
}
