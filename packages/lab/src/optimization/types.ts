/**
 * Hyperparameter expansion types
 */

import { z } from 'zod';

/**
 * How a space is turned into combinations
 *
 * - grid: the full cartesian product
 * - random: a seeded subset (searchCount or searchPercent), kept in grid order
 * - permute: permuteCount combinations in seeded random order
 */
export type ExpansionStrategy = 'grid' | 'random' | 'permute';

export const ExpansionOptionsSchema = z
  .object({
    searchCount: z.number().int().optional(),
    searchPercent: z.number().optional(),
    permuteCount: z.number().int().optional(),
    seed: z.number().int().nonnegative().optional(),
  })
  .strict();

export type ExpansionOptions = z.infer<typeof ExpansionOptionsSchema>;

export interface SpaceValidation {
  valid: boolean;
  errors: string[];
}
