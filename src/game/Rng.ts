export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
}

const FALLBACK_SEED = 0x9e3779b9;

/** Seedable xorshift32; the same seed replays the same sequence. */
export class Rng implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0 || FALLBACK_SEED;
  }

  next(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x >>> 0;
    return this.state / 0x100000000;
  }

  range(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number {
    return Math.floor(this.range(min, max + 1));
  }
}

/**
 * Draws a key with probability proportional to its weight. Weights must be
 * non-negative with a positive sum.
 */
export function weightedPick<K extends string>(
  rng: RandomSource,
  keys: readonly K[],
  weights: Record<K, number>,
): K {
  let total = 0;
  for (const key of keys) total += weights[key];
  let roll = rng.next() * total;
  for (const key of keys) {
    roll -= weights[key];
    if (roll < 0) return key;
  }
  // rounding can leave roll at exactly 0: fall back to the last weighted key
  for (let i = keys.length - 1; i >= 0; i--) {
    if (weights[keys[i]] > 0) return keys[i];
  }
  return keys[keys.length - 1];
}
