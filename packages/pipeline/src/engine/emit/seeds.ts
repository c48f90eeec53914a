import { InvalidScenarioError } from '../../lib/errors.js';

/** Uniform in [0, 1), like Math.random */
export type RandomSource = () => number;

export const MIN_SEED = 1;
export const MAX_SEED = 9998;

/**
 * Draw `count` distinct seeds from [MIN_SEED, MAX_SEED] (partial
 * Fisher-Yates shuffle).
 */
export function drawSeeds(count: number, random: RandomSource = Math.random): number[] {
  const poolSize = MAX_SEED - MIN_SEED + 1;
  if (!Number.isInteger(count) || count < 1 || count > poolSize) {
    throw new InvalidScenarioError('repeats', `Cannot draw ${count} distinct seeds`, `1..${poolSize}`, String(count));
  }

  const pool = Array.from({ length: poolSize }, (_, i) => MIN_SEED + i);
  for (let i = 0; i < count; i++) {
    const j = i + Math.min(Math.floor(random() * (poolSize - i)), poolSize - i - 1);
    const picked = pool[j] ?? 0;
    pool[j] = pool[i] ?? 0;
    pool[i] = picked;
  }
  return pool.slice(0, count);
}

/**
 * Deterministic source for reproducible batches (mulberry32).
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}
