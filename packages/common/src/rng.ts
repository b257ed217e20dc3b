export type RngState = {
  seed: number;
};

// LCG so a seeded game replays the same enemy motion.
export function createRng(seed: number): RngState {
  return { seed: seed >>> 0 };
}

/**
 * Uniform float in [0, 1)
 */
export function nextFloat(rng: RngState): number {
  // LCG parameters (Numerical Recipes)
  rng.seed = (Math.imul(rng.seed, 1664525) + 1013904223) >>> 0;
  return rng.seed / 0x100000000;
}

/**
 * Uniform integer in [min, max], both ends included
 */
export function nextInt(rng: RngState, min: number, max: number): number {
  return min + Math.floor(nextFloat(rng) * (max - min + 1));
}

export function pick<T>(rng: RngState, options: readonly T[]): T {
  if (options.length === 0) {
    throw new RangeError('pick needs at least one option');
  }
  return options[Math.floor(nextFloat(rng) * options.length)];
}
