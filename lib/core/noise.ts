// lib/core/noise.ts
// Seedable deterministic random streams used across the sim.

import seedrandom from 'seedrandom';

/** Stable non-crypto hash -> 32-bit unsigned int (FNV-1a). */
function hash32(input: string): number {
  let h = 2166136261 >>> 0;
  for (let i = 0; i < input.length; i++) {
    h ^= input.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return (h >>> 0) || 1;
}

export const hashString32 = hash32;

/**
 * Seeded uniform stream. Forks derive a child stream from the seed and a salt only,
 * so draws taken in one fork never shift the numbers seen by another.
 */
export class RandomStream {
  readonly seed: string;
  private readonly prng: () => number;

  constructor(seed: number | string) {
    this.seed = String(seed);
    this.prng = seedrandom(this.seed);
  }

  /** float in [0, 1) */
  next(): number {
    return this.prng();
  }

  chance(p: number): boolean {
    if (p <= 0) return false;
    if (p >= 1) return true;
    return this.next() < p;
  }

  /** k distinct items, order of draw. */
  sample<T>(items: readonly T[], k: number): T[] {
    const pool = items.slice();
    const out: T[] = [];
    const n = Math.min(Math.max(0, Math.floor(k)), pool.length);
    for (let i = 0; i < n; i++) {
      const idx = Math.floor(this.next() * pool.length);
      out.push(pool[idx]);
      pool.splice(idx, 1);
    }
    return out;
  }

  fork(salt: string): RandomStream {
    return new RandomStream(`${this.seed}:${hash32(salt).toString(16)}`);
  }
}
