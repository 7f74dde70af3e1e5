/**
 * Loads understudy.toml from disk.
 *
 * @packageDocumentation
 */

import { readFile } from 'node:fs/promises';
import { applyEnvOverrides, type EnvRecord } from './env.js';
import { getDefaultConfig, parseConfig } from './parser.js';
import type { Config } from './types.js';
import { assertConfigValid } from './validator.js';

/**
 * Default configuration file name, resolved against the working directory.
 */
export const DEFAULT_CONFIG_PATH = 'understudy.toml';

/**
 * Options for loading configuration.
 */
export interface LoadConfigOptions {
  /** Environment to read overrides from (defaults to process.env). */
  env?: EnvRecord;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Reads, parses and validates a configuration file, then applies
 * environment overrides. A missing file yields the defaults.
 *
 * @param path - Path of the TOML file.
 * @param options - Loading options.
 * @returns The effective configuration.
 * @throws ConfigParseError for invalid TOML or field types.
 * @throws EnvCoercionError for an environment value that cannot be coerced.
 * @throws ConfigValidationError for semantically invalid values.
 */
export async function loadConfig(
  path: string = DEFAULT_CONFIG_PATH,
  options: LoadConfigOptions = {}
): Promise<Config> {
  let config: Config;
  try {
    config = parseConfig(await readFile(path, 'utf-8'));
  } catch (error) {
    if (!isMissingFile(error)) {
      throw error;
    }
    config = getDefaultConfig();
  }

  const effective = applyEnvOverrides(config, options.env ?? process.env);
  assertConfigValid(effective);
  return effective;
}
