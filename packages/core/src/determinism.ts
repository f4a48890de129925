/**
 * Determinism
 *
 * Seeded randomness for everything that shuffles or samples: stratified
 * splits, fold assignment and hyperparameter search. Same seed, same output.
 */

/**
 * Deterministic random number generator interface
 *
 * Replaces Math.random() to ensure seeded, deterministic randomness.
 */
export interface DeterministicRNG {
  /**
   * Generate next random number in [0, 1)
   */
  next(): number;

  /**
   * Generate next random integer in [min, max] (inclusive)
   */
  nextInt(min: number, max: number): number;

  /**
   * Seed this generator was created with
   */
  getSeed(): number;

  /**
   * Independent copy at the current position of the stream
   */
  clone(): DeterministicRNG;
}

/**
 * Seeded RNG (mulberry32). 32-bit state, never returns 1.
 */
export class SeededRNG implements DeterministicRNG {
  private state: number;
  private readonly seed: number;

  constructor(seed: number) {
    this.seed = seed >>> 0;
    this.state = this.seed;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextInt(min: number, max: number): number {
    const range = max - min + 1;
    return min + Math.floor(this.next() * range);
  }

  getSeed(): number {
    return this.seed;
  }

  clone(): DeterministicRNG {
    const cloned = new SeededRNG(this.seed);
    cloned.state = this.state;
    return cloned;
  }
}

/**
 * Generate a deterministic 32-bit seed from a string
 */
export function seedFromString(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    hash = (hash << 5) - hash + str.charCodeAt(i);
    hash = hash & hash;
  }
  return Math.abs(hash);
}

/**
 * Derive an independent stream seed, e.g. deriveSeed(42, 'folds')
 */
export function deriveSeed(seed: number, ...labels: Array<string | number>): number {
  return seedFromString([seed, ...labels].join(':'));
}

/**
 * Fisher-Yates shuffle into a new array
 */
export function shuffle<T>(items: readonly T[], rng: DeterministicRNG): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = rng.nextInt(0, i);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
}

/**
 * Draw `count` distinct items without replacement, in draw order
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  rng: DeterministicRNG
): T[] {
  return shuffle(items, rng).slice(0, Math.max(0, Math.min(count, items.length)));
}
