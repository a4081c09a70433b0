export type RandomSource = () => number;

/**
 * Deterministic generator (mulberry32) returning floats in [0, 1).
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

/**
 * Pick up to `count` items without replacement, in random order.
 * Returns every item (shuffled) when fewer than `count` are available.
 */
export function sampleWithoutReplacement<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = Math.random,
): T[] {
  const pool = [...items];
  const take = Math.min(Math.max(0, Math.floor(count)), pool.length);

  // Partial Fisher-Yates: the first `take` slots end up holding the sample
  for (let i = 0; i < take; i++) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
}
