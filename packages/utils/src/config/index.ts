/**
 * Runtime configuration
 *
 * Priority: strata.yaml > environment variables > defaults.
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { loadConfigFromYaml } from './yaml-config.js';

export const RuntimeConfigSchema = z.object({
  randomSeed: z.number().int().nonnegative(),
  queueConcurrency: z.number().int().min(1),
  defaultBinCount: z.number().int().min(2),
  repeatCount: z.number().int().min(1),
});

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  randomSeed: 42,
  queueConcurrency: 1,
  defaultBinCount: 3,
  repeatCount: 1,
};

const ENV_KEYS: Record<keyof RuntimeConfig, string> = {
  randomSeed: 'STRATA_RANDOM_SEED',
  queueConcurrency: 'STRATA_QUEUE_CONCURRENCY',
  defaultBinCount: 'STRATA_DEFAULT_BIN_COUNT',
  repeatCount: 'STRATA_REPEAT_COUNT',
};

function readNumberEnv(key: string): number | undefined {
  const value = process.env[key];
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`${key} must be a number, got '${value}'`, key);
  }
  return parsed;
}

/**
 * Resolve runtime configuration, validating the merged result
 */
export function getRuntimeConfig(configPath?: string): RuntimeConfig {
  const yaml = loadConfigFromYaml(configPath);

  const merged = {
    randomSeed:
      yaml.randomSeed ?? readNumberEnv(ENV_KEYS.randomSeed) ?? DEFAULT_RUNTIME_CONFIG.randomSeed,
    queueConcurrency:
      yaml.queue?.concurrency ??
      readNumberEnv(ENV_KEYS.queueConcurrency) ??
      DEFAULT_RUNTIME_CONFIG.queueConcurrency,
    defaultBinCount:
      yaml.stratifier?.binCount ??
      readNumberEnv(ENV_KEYS.defaultBinCount) ??
      DEFAULT_RUNTIME_CONFIG.defaultBinCount,
    repeatCount:
      yaml.queue?.repeatCount ??
      readNumberEnv(ENV_KEYS.repeatCount) ??
      DEFAULT_RUNTIME_CONFIG.repeatCount,
  };

  const parsed = RuntimeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path[0];
    const configKey = Object.entries(ENV_KEYS).find(([name]) => name === field)?.[1];
    throw new ConfigurationError(
      `Invalid runtime configuration: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      configKey
    );
  }
  return parsed.data;
}

export { loadConfigFromYaml, clearConfigCache, YamlConfigSchema } from './yaml-config.js';
export type { YamlConfig } from './yaml-config.js';
