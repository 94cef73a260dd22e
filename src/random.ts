/**
 * Random sources for the rotation policies.
 *
 * Policies never call Math.random directly; they receive a RandomSource so
 * tests (and reproducible simulations) can pass a seeded one.
 */

/** Returns a float in [0, 1) */
export type RandomSource = () => number;

/**
 * Seeded PRNG (mulberry32). Same seed, same sequence; 32-bit state is plenty
 * for picking creatives.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
