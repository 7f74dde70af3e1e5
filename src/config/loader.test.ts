import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadConfig } from './loader.js';
import { ConfigParseError } from './parser.js';
import { ConfigValidationError } from './validator.js';
import { DEFAULT_CONFIG } from './defaults.js';

describe('loadConfig', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'understudy-config-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('should return the defaults when the file does not exist', async () => {
    const config = await loadConfig(join(tempDir, 'missing.toml'), { env: {} });

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('should read the file and apply environment overrides', async () => {
    const path = join(tempDir, 'understudy.toml');
    await writeFile(path, '[logging]\ncomponent = "from-file"\n\n[marshaling]\nbyte_order = "big"\n');

    const config = await loadConfig(path, { env: { UNDERSTUDY_LOGGING_COMPONENT: 'from-env' } });

    expect(config.logging.component).toBe('from-env');
    expect(config.marshaling.byte_order).toBe('big');
  });

  it('should propagate parse errors', async () => {
    const path = join(tempDir, 'broken.toml');
    await writeFile(path, '[logging\n');

    await expect(loadConfig(path, { env: {} })).rejects.toBeInstanceOf(ConfigParseError);
  });

  it('should validate the effective configuration', async () => {
    const path = join(tempDir, 'understudy.toml');
    await writeFile(path, '[verification]\nmax_listed_invocations = 0\n');

    await expect(loadConfig(path, { env: {} })).rejects.toBeInstanceOf(ConfigValidationError);
  });
});
