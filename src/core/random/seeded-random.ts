/**
 * Deterministic PRNG using the xoshiro128++ algorithm.
 *
 * - 32-bit operations only
 * - Four 32-bit state words seeded through SplitMix32
 * - `next()` returns a double in [0, 1)
 *
 * Reference: https://prng.di.unimi.it/xoshiro128plusplus.c
 */

/**
 * Anything the simulator can draw from. Every draw advances the stream.
 */
export interface RandomSource {
  /** Uniform double in [0, 1) */
  next(): number;
  /** Uniform double in [min, max) */
  uniform(min: number, max: number): number;
  /** True with the given probability */
  chance(probability: number): boolean;
}

export type RngState = [number, number, number, number];

function splitmix32(seed: number): () => number {
  let z = seed >>> 0;
  return () => {
    z = (z + 0x9e3779b9) >>> 0;
    let t = z;
    t = Math.imul(t ^ (t >>> 16), 0x21f0aaad);
    t = Math.imul(t ^ (t >>> 15), 0x735a2d97);
    return (t ^ (t >>> 15)) >>> 0;
  };
}

function rotl(x: number, k: number): number {
  return ((x << k) | (x >>> (32 - k))) >>> 0;
}

/**
 * Reduce any safe integer (negative included) to a 32-bit seed.
 * High and low halves are mixed so seeds beyond 2^32 stay distinct.
 */
export function normalizeSeed(seed: number): number {
  const low = seed % 0x100000000;
  const high = Math.floor(seed / 0x100000000);
  return (low ^ Math.imul(high, 0x85ebca6b)) >>> 0;
}

export class SeededRandom implements RandomSource {
  private s: RngState;

  constructor(seed: number) {
    const mix = splitmix32(normalizeSeed(seed));
    this.s = [mix(), mix(), mix(), mix()];

    // xoshiro needs at least one non-zero word
    if ((this.s[0] | this.s[1] | this.s[2] | this.s[3]) === 0) {
      this.s[0] = 1;
    }

    // Warm up to scatter initial correlation
    for (let i = 0; i < 8; i++) {
      this.next32();
    }
  }

  private next32(): number {
    const s = this.s;
    const result = (rotl((s[0] + s[3]) >>> 0, 7) + s[0]) >>> 0;
    const t = (s[1] << 9) >>> 0;

    s[2] ^= s[0];
    s[3] ^= s[1];
    s[1] ^= s[2];
    s[0] ^= s[3];

    s[2] ^= t;
    s[3] = rotl(s[3], 11);

    return result;
  }

  next(): number {
    return this.next32() / 0x100000000;
  }

  uniform(min: number, max: number): number {
    return min + (max - min) * this.next();
  }

  chance(probability: number): boolean {
    return this.next() < probability;
  }

  /** Snapshot the state for exact replay. */
  getState(): RngState {
    return [this.s[0], this.s[1], this.s[2], this.s[3]];
  }

  setState(state: RngState): void {
    this.s = [state[0] >>> 0, state[1] >>> 0, state[2] >>> 0, state[3] >>> 0];
  }
}

/**
 * Independent seed for the index-th trial of a run, for callers that give
 * each trial its own stream.
 */
export function deriveSeed(seed: number, index: number): number {
  const mix = splitmix32(normalizeSeed(seed) ^ Math.imul(index >>> 0, 0x9e3779b1));
  return mix();
}
