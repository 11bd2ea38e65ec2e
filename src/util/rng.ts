import { randomInt as cryptoRandomInt } from 'node:crypto';

export type RNG = (maxExclusive: number) => number;

const SEED_SPACE = 0x100000000;

export const cryptoRNG: RNG = (maxExclusive: number) => {
  if (maxExclusive <= 0) throw new Error('maxExclusive must be > 0');
  return cryptoRandomInt(0, maxExclusive);
};

// Deterministic PRNG for tests and reproducible runs
export function mulberry32(seed: number): RNG {
  let t = seed >>> 0;
  return (maxExclusive: number) => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    r = ((r ^ (r >>> 14)) >>> 0) / 4294967296; // 0..1
    return Math.floor(r * maxExclusive);
  };
}

export function seededRNG(seed: number): RNG {
  return mulberry32(seed);
}

/** Seeded source when a seed is configured, crypto otherwise. */
export function rngFromSeed(seed?: number): RNG {
  return seed !== undefined ? mulberry32(seed) : cryptoRNG;
}

/** Draws a fresh 32-bit seed, used to give each worker chunk its own stream. */
export function deriveSeed(rng: RNG): number {
  return rng(SEED_SPACE);
}

export function pick<T>(arr: readonly T[], rng: RNG = cryptoRNG): T {
  if (arr.length === 0) throw new Error('Cannot pick from empty array');
  return arr[rng(arr.length)];
}

export function shuffle<T>(items: readonly T[], rng: RNG = cryptoRNG): T[] {
  const a = items.slice();
  for (let i = a.length - 1; i > 0; i--) {
    const j = rng(i + 1);
    [a[i], a[j]] = [a[j], a[i]];
  }
  return a;
}
