/**
 * YAML Configuration Loader
 * ==========================
 * Loads strata.yaml with fallback to environment variables
 */

import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { load } from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { logger } from '../logger.js';

export const YamlConfigSchema = z
  .object({
    randomSeed: z.number().int().nonnegative().optional(),
    queue: z
      .object({
        concurrency: z.number().int().min(1).optional(),
        repeatCount: z.number().int().min(1).optional(),
      })
      .optional(),
    stratifier: z
      .object({
        binCount: z.number().int().min(2).optional(),
      })
      .optional(),
  })
  .passthrough();

export type YamlConfig = z.infer<typeof YamlConfigSchema>;

let cachedConfig: YamlConfig | null = null;

/**
 * Load configuration from strata.yaml (or the given path).
 * A missing or unreadable file yields an empty config; a file that parses but
 * does not fit the schema is a ConfigurationError.
 */
export function loadConfigFromYaml(configPath?: string): YamlConfig {
  if (cachedConfig !== null) {
    return cachedConfig;
  }

  const resolvedPath = configPath || process.env.STRATA_CONFIG || join(process.cwd(), 'strata.yaml');

  if (!existsSync(resolvedPath)) {
    logger.debug('strata.yaml not found, using environment variables only', { path: resolvedPath });
    cachedConfig = {};
    return cachedConfig;
  }

  let raw: unknown;
  try {
    raw = load(readFileSync(resolvedPath, 'utf-8'));
  } catch (error) {
    logger.warn('Failed to load strata.yaml, using environment variables only', {
      path: resolvedPath,
      error: error instanceof Error ? error.message : String(error),
    });
    cachedConfig = {};
    return cachedConfig;
  }

  const parsed = YamlConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const key = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid strata.yaml: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ')}`,
      key,
      { path: resolvedPath }
    );
  }

  logger.info('Loaded configuration from strata.yaml', { path: resolvedPath });
  cachedConfig = parsed.data;
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
