// engine/src/prng.ts
// Deterministic RNG utilities for maze generation.

import type { RandomSource } from './types.js';

// xorshift32; state is never zero.
export class XorShift32 implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0 || 0x9e3779b9;
  }

  /** Uniform integer in [min, maxExclusive); an empty range yields min. */
  int(min: number, maxExclusive: number): number {
    const lo = Math.floor(min);
    const span = Math.floor(maxExclusive) - lo;
    return span > 0 ? lo + (this.nextU32() % span) : lo;
  }

  private nextU32(): number {
    let x = this.state;
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    this.state = x | 0;
    return this.state >>> 0;
  }
}

/** Fisher-Yates over any random source. */
export function shuffleInPlace<T>(arr: T[], rng: RandomSource): T[] {
  for (let i = arr.length - 1; i > 0; i--) {
    const j = rng.int(0, i + 1);
    const tmp = arr[i];
    arr[i] = arr[j];
    arr[j] = tmp;
  }
  return arr;
}

/**
 * Stable seed mixer for seed + maze dimensions + label.
 * Keep everything in 32-bit int space.
 */
export function hashSeed(seed: number, width: number, height: number, label: string): number {
  let h = 2166136261 >>> 0; // FNV-1a offset
  const mixU32 = (v: number) => {
    h ^= v >>> 0;
    h = Math.imul(h, 16777619) >>> 0;
  };

  mixU32(seed);
  mixU32(width);
  mixU32(height);

  for (let i = 0; i < label.length; i++) {
    h ^= label.charCodeAt(i) & 0xff;
    h = Math.imul(h, 16777619) >>> 0;
  }

  h ^= h >>> 16;
  h = Math.imul(h, 0x7feb352d) >>> 0;
  h ^= h >>> 15;
  h = Math.imul(h, 0x846ca68b) >>> 0;
  h ^= h >>> 16;

  return h | 0;
}

// Fresh 31-bit seed for callers that did not ask for one.
export function randomSeed(): number {
  return (Date.now() ^ (Math.random() * 0x7fffffff)) & 0x7fffffff;
}
