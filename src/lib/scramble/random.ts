export type RandomSource = () => number;

/**
 * mulberry32: small 32-bit PRNG, good enough for reproducible shuffles.
 * Returns floats in [0, 1).
 */
const mulberry32 = (seed: number): RandomSource => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

export const createRandom = (seed?: number): RandomSource =>
  seed === undefined ? Math.random : mulberry32(seed);
