/**
 * Seeded pseudo-random numbers (mulberry32)
 *
 * Each generator owns its state; create one per use so results do not depend
 * on what ran before.
 */

export interface SeededRandom {
  /** Float in [0, 1) */
  next(): number;
  /** Integer in [min, max], both inclusive */
  randint(min: number, max: number): number;
}

export function createSeededRandom(seed: number): SeededRandom {
  let state = seed >>> 0;

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    randint: (min, max) => min + Math.floor(next() * (max - min + 1)),
  };
}
