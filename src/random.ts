export type RandomSource = () => number;

const DEFAULT_SEED = 1337;

/** Linear congruential generator; yields values in [0, 1). */
export function createRng(seed?: number): RandomSource {
  let state = (seed ?? DEFAULT_SEED) >>> 0;
  if (state === 0) {
    state = DEFAULT_SEED;
  }
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

/**
 * Picks an index proportionally to `weights`, scanning in order so that equal weights
 * resolve to the earliest entry for a given draw.
 */
export function pickWeighted(weights: number[], random: RandomSource): number {
  const total = weights.reduce((acc, w) => acc + Math.max(0, w), 0);
  if (total <= 0) return 0;
  let r = random() * total;
  for (let i = 0; i < weights.length; i += 1) {
    r -= Math.max(0, weights[i]);
    if (r < 0) return i;
  }
  return weights.length - 1;
}
