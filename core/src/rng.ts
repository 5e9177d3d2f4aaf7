export interface Rng {
  next(): number;
  uniform(min: number, max: number): number;
}

export const clamp01 = (value: number): number => Math.min(1, Math.max(0, value));

export function createRng(seed: number): Rng {
  let state = seed >>> 0;

  const next = (): number => {
    state += 0x6d2b79f5;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    next,
    uniform(min: number, max: number) {
      return min + next() * (max - min);
    }
  };
}

/**
 * Per-run seed for a sweep. Each run owns its generator, so a run's numbers
 * depend on (baseSeed, runId) only and never on which runs came before it.
 */
export function deriveSeed(baseSeed: number, runId: number): number {
  let h = (baseSeed >>> 0) ^ Math.imul(runId + 1, 0x9e3779b1);
  h = Math.imul(h ^ (h >>> 16), 0x85ebca6b);
  h = Math.imul(h ^ (h >>> 13), 0xc2b2ae35);
  return (h ^ (h >>> 16)) >>> 0;
}
