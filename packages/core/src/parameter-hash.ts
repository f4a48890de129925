/**
 * Content hashing
 *
 * Stable ids for hyperparameter combinations and pipeline configurations.
 */

import { createHash } from 'crypto';

/**
 * JSON with object keys sorted at every depth
 */
export function stableStringify(value: unknown): string {
  return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(normalize);
  }
  if (value !== null && typeof value === 'object') {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = normalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

export function sha256Hex(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/**
 * Compute parameter vector hash (key order does not matter)
 */
export function computeParameterHash(parameters: Readonly<Record<string, unknown>>): string {
  return sha256Hex(stableStringify(parameters));
}
