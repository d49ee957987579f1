/**
 * Randomness source returning a value in [0, 1).
 * `Math.random` satisfies it; tests and replays pass a seeded generator.
 */
export type Rng = () => number;

/** Deterministic PRNG based on mulberry32. */
export function createSeededRng(seed: number): Rng {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw a uniform integer in [0, count).
 * Values outside [0, 1) are clamped into the range.
 */
export function randomIndex(rng: Rng, count: number): number {
  const value = rng();
  if (!Number.isFinite(value) || value < 0) {
    return 0;
  }
  return Math.min(count - 1, Math.floor(value * count));
}

export function pickRandom<T>(rng: Rng, items: readonly T[]): T | undefined {
  if (items.length === 0) {
    return undefined;
  }
  return items[randomIndex(rng, items.length)];
}
