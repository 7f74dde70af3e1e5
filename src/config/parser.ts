/**
 * TOML configuration parser for understudy.toml.
 *
 * @packageDocumentation
 */

import * as TOML from '@iarna/toml';
import type { ByteOrder } from '../marshaling/index.js';
import { DEFAULT_CONFIG, DEFAULT_LOGGING, DEFAULT_MARSHALING, DEFAULT_VERIFICATION } from './defaults.js';
import type { Config, LoggingConfig, MarshalingConfig, VerificationConfig } from './types.js';

/**
 * Error class for configuration parsing errors.
 */
export class ConfigParseError extends Error {
  /** The original error that caused the parse failure, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new ConfigParseError.
   *
   * @param message - Descriptive error message.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'ConfigParseError';
    this.cause = cause;
  }
}

/**
 * Recognized byte orders.
 */
export const BYTE_ORDERS: readonly ByteOrder[] = ['little', 'big'];

/**
 * Narrows a string to a byte order.
 */
export function isByteOrder(value: string): value is ByteOrder {
  return value === 'little' || value === 'big';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates that a value is a table (or absent).
 *
 * @throws ConfigParseError if the value is present but not a table.
 */
function validateSection(value: unknown, section: string): Record<string, unknown> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new ConfigParseError(`Invalid type for '${section}': expected a table, got ${typeof value}`);
  }
  return value;
}

/**
 * Validates that a value is a string.
 *
 * @throws ConfigParseError if value is not a string.
 */
function validateString(value: unknown, fieldPath: string): string {
  if (typeof value !== 'string') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected string, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a number.
 *
 * @throws ConfigParseError if value is not a number.
 */
function validateNumber(value: unknown, fieldPath: string): number {
  if (typeof value !== 'number') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected number, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a boolean.
 *
 * @throws ConfigParseError if value is not a boolean.
 */
function validateBoolean(value: unknown, fieldPath: string): boolean {
  if (typeof value !== 'boolean') {
    throw new ConfigParseError(
      `Invalid type for '${fieldPath}': expected boolean, got ${typeof value}`
    );
  }
  return value;
}

/**
 * Validates that a value is a recognized byte order.
 *
 * @throws ConfigParseError for any other value.
 */
function validateByteOrder(value: unknown, fieldPath: string): ByteOrder {
  const text = validateString(value, fieldPath);
  if (!isByteOrder(text)) {
    throw new ConfigParseError(
      `Invalid value for '${fieldPath}': expected one of ${BYTE_ORDERS.join(', ')}, got '${text}'`
    );
  }
  return text;
}

function parseLogging(raw: Record<string, unknown> | undefined): LoggingConfig {
  const result: LoggingConfig = { ...DEFAULT_LOGGING };
  if (raw === undefined) {
    return result;
  }

  if ('debug' in raw) {
    result.debug = validateBoolean(raw.debug, 'logging.debug');
  }
  if ('component' in raw) {
    result.component = validateString(raw.component, 'logging.component');
  }

  return result;
}

function parseMarshaling(raw: Record<string, unknown> | undefined): MarshalingConfig {
  const result: MarshalingConfig = { ...DEFAULT_MARSHALING };
  if (raw === undefined) {
    return result;
  }

  if ('byte_order' in raw) {
    result.byte_order = validateByteOrder(raw.byte_order, 'marshaling.byte_order');
  }

  return result;
}

function parseVerification(raw: Record<string, unknown> | undefined): VerificationConfig {
  const result: VerificationConfig = { ...DEFAULT_VERIFICATION };
  if (raw === undefined) {
    return result;
  }

  if ('max_listed_invocations' in raw) {
    result.max_listed_invocations = validateNumber(
      raw.max_listed_invocations,
      'verification.max_listed_invocations'
    );
  }

  return result;
}

/**
 * Parses a TOML string into a Config object.
 *
 * @param tomlContent - Raw TOML content as a string.
 * @returns Configuration object with defaults applied for missing fields.
 * @throws ConfigParseError for invalid TOML syntax or invalid field types.
 *
 * @example
 * ```typescript
 * const config = parseConfig(`
 * [logging]
 * debug = true
 *
 * [verification]
 * max_listed_invocations = 5
 * `);
 * config.logging.debug; // true
 * ```
 */
export function parseConfig(tomlContent: string): Config {
  let parsed: Record<string, unknown>;

  try {
    parsed = TOML.parse(tomlContent);
  } catch (error) {
    const tomlError = error instanceof Error ? error : new Error(String(error));
    throw new ConfigParseError(`Invalid TOML syntax: ${tomlError.message}`, tomlError);
  }

  return {
    logging: parseLogging(validateSection(parsed.logging, 'logging')),
    marshaling: parseMarshaling(validateSection(parsed.marshaling, 'marshaling')),
    verification: parseVerification(validateSection(parsed.verification, 'verification')),
  };
}

/**
 * Returns a copy of the default configuration.
 */
export function getDefaultConfig(): Config {
  return {
    logging: { ...DEFAULT_CONFIG.logging },
    marshaling: { ...DEFAULT_CONFIG.marshaling },
    verification: { ...DEFAULT_CONFIG.verification },
  };
}
