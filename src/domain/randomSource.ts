import { randomInt } from "crypto";

/**
 * A uniform source over [0, 1). Each draw gets its own instance so sessions
 * never share generator state.
 */
export interface RandomSource {
  next(): number;
}

export type RandomSourceFactory = (seed: number) => RandomSource;

const MAX_SEED = 0xffffffff;

/**
 * Deterministic generator (mulberry32) for reproducible draws
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/**
 * Fresh, non-reproducible 32-bit seed. Recorded on the session so the draw can be replayed.
 */
export function generateSeed(): number {
  return randomInt(0, MAX_SEED);
}

export function isValidSeed(seed: unknown): seed is number {
  return typeof seed === "number" && Number.isInteger(seed) && seed >= 0 && seed <= MAX_SEED;
}

/**
 * Uniformly pick `count` items without replacement (partial Fisher–Yates).
 * Does not modify the input; result is in pick order.
 */
export function sampleWithoutReplacement<T>(items: T[], count: number, random: RandomSource): T[] {
  const pool = [...items];
  const picked: T[] = [];
  for (let i = 0; i < count && i < pool.length; i++) {
    const j = i + Math.floor(random.next() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
    picked.push(pool[i]);
  }
  return picked;
}
