import { randomInt } from "node:crypto";

/**
 * A source of uniform floats in [0, 1). Every random choice the generator
 * makes is drawn from one of these, in sequence.
 */
export interface RandomSource {
  next(): number;
}

const UINT32_RANGE = 0x1_0000_0000;

/**
 * Mulberry32 over a 32-bit seed. Same seed → same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / UINT32_RANGE;
    },
  };
}

/**
 * Non-deterministic source backed by crypto.randomInt.
 */
export const systemRandom: RandomSource = {
  next: () => randomInt(UINT32_RANGE) / UINT32_RANGE,
};

/** Integer uniform in [0, n). */
export function randomBelow(rng: RandomSource, n: number): number {
  return Math.floor(rng.next() * n);
}

/** Integer uniform in [lo, hi). */
export function randomRange(rng: RandomSource, lo: number, hi: number): number {
  return lo + randomBelow(rng, hi - lo);
}

export function chance(rng: RandomSource, probability: number): boolean {
  return rng.next() < probability;
}

export function pick<T>(rng: RandomSource, items: readonly [T, ...T[]]): T {
  return items[randomBelow(rng, items.length)] ?? items[0];
}
