/**
 * Random sources.
 *
 * Agents take a `() => number` so runs can be replayed from a seed.
 */

export type RandomSource = () => number;

export const defaultRandom: RandomSource = Math.random;

/**
 * Deterministic generator (mulberry32) returning floats in [0, 1).
 */
export function createSeededRng(seed: number): RandomSource {
  let t = seed >>> 0;
  return () => {
    t = (t + 0x6d2b79f5) >>> 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Uniform integer in [0, n).
 */
export function randomInt(random: RandomSource, n: number): number {
  return Math.min(n - 1, Math.floor(random() * n));
}

/**
 * Standard normal sample (Box-Muller).
 */
export function randomNormal(random: RandomSource): number {
  let u = 0;
  while (u === 0) u = random();
  const v = random();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}
