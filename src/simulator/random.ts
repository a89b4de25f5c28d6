/** Source of uniform draws in [0, 1). All simulator randomness goes through one of these. */
export interface RandomSource {
  next(): number;
}

export const mathRandom: RandomSource = {
  next: () => Math.random()
};

/** mulberry32; identical seeds give identical runs. */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

/**
 * Replays `values` in order, then keeps returning `fallback`.
 * Lets tests pin every draw a routine makes.
 */
export function scriptedRandom(values: number[], fallback = 0.5): RandomSource {
  let index = 0;
  return {
    next() {
      const value = index < values.length ? values[index] : fallback;
      index += 1;
      return value;
    }
  };
}

export function uniform(rng: RandomSource, min: number, max: number): number {
  return min + (max - min) * rng.next();
}

export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

export function pick<T>(rng: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new Error("Cannot pick from an empty list");
  const index = Math.min(items.length - 1, Math.floor(rng.next() * items.length));
  return items[index];
}
