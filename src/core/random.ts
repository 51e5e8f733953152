/** Source of uniform numbers in [0, 1). */
export type RandomSource = () => number;

/**
 * Seeded linear congruential generator (Numerical Recipes constants). Divided by 2^32 so the
 * result never reaches 1.
 */
export function createLcg(seed: number): RandomSource {
  let state = (seed & 0x7fffffff) >>> 0;
  return () => {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function randomRange(rand: RandomSource, min: number, max: number): number {
  return min + rand() * (max - min);
}

export function randomPick<T>(rand: RandomSource, items: readonly T[]): T {
  if (items.length === 0) throw new RangeError('randomPick: empty list');
  const idx = Math.min(items.length - 1, Math.floor(rand() * items.length));
  return items[idx];
}
