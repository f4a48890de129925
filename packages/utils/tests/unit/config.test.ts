import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, writeFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { getRuntimeConfig, clearConfigCache } from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors.js';

const ENV_KEYS = [
  'STRATA_RANDOM_SEED',
  'STRATA_QUEUE_CONCURRENCY',
  'STRATA_DEFAULT_BIN_COUNT',
  'STRATA_REPEAT_COUNT',
];

describe('getRuntimeConfig', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'strata-config-'));
    clearConfigCache();
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    clearConfigCache();
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  it('should fall back to defaults', () => {
    const config = getRuntimeConfig(join(dir, 'missing.yaml'));

    expect(config).toEqual({
      randomSeed: 42,
      queueConcurrency: 1,
      defaultBinCount: 3,
      repeatCount: 1,
    });
  });

  it('should read environment variables', () => {
    process.env.STRATA_RANDOM_SEED = '7';
    process.env.STRATA_QUEUE_CONCURRENCY = '4';

    const config = getRuntimeConfig(join(dir, 'missing.yaml'));

    expect(config.randomSeed).toBe(7);
    expect(config.queueConcurrency).toBe(4);
  });

  it('should prefer YAML over environment', () => {
    const path = join(dir, 'strata.yaml');
    writeFileSync(path, 'randomSeed: 99\nqueue:\n  repeatCount: 3\nstratifier:\n  binCount: 5\n');
    process.env.STRATA_RANDOM_SEED = '7';

    const config = getRuntimeConfig(path);

    expect(config).toEqual({
      randomSeed: 99,
      queueConcurrency: 1,
      defaultBinCount: 5,
      repeatCount: 3,
    });
  });

  it('should reject non-numeric environment values', () => {
    process.env.STRATA_QUEUE_CONCURRENCY = 'many';

    expect(() => getRuntimeConfig(join(dir, 'missing.yaml'))).toThrow(ConfigurationError);
  });

  it('should reject out-of-range values and name the key', () => {
    process.env.STRATA_DEFAULT_BIN_COUNT = '1';

    try {
      getRuntimeConfig(join(dir, 'missing.yaml'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.configKey).toBe('STRATA_DEFAULT_BIN_COUNT');
    }
  });

  it('should reject YAML that does not fit the schema', () => {
    const path = join(dir, 'strata.yaml');
    writeFileSync(path, 'queue:\n  concurrency: 0\n');

    expect(() => getRuntimeConfig(path)).toThrow(ConfigurationError);
  });
});
