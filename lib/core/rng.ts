// lib/core/rng.ts
// Seedable RNG for graph growth, minority fill and batch seeding.
import seedrandom from 'seedrandom';

export type Seed = number | string;

export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
  /** k distinct items drawn without replacement (partial Fisher-Yates). */
  sample<T>(items: readonly T[], k: number): T[];
}

export function createRng(seed: Seed): Rng {
  const prng = seedrandom(String(seed));

  const next = (): number => prng();
  const int = (maxExclusive: number): number => Math.floor(next() * maxExclusive);

  return {
    next,
    int,
    sample<T>(items: readonly T[], k: number): T[] {
      if (k > items.length) {
        throw new RangeError(`Cannot sample ${k} items from ${items.length}`);
      }
      const pool = items.slice();
      for (let i = 0; i < k; i++) {
        const j = i + int(pool.length - i);
        const tmp = pool[i];
        pool[i] = pool[j];
        pool[j] = tmp;
      }
      return pool.slice(0, k);
    },
  };
}

/** Derives a child seed from a parent stream, range [0, 2^31). */
export function drawSeed(rng: Rng): number {
  return rng.int(0x80000000);
}
