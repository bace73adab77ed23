import type { RGB } from '@tilecrawl/protocol';

const MASK_64 = 0xffffffffffffffffn;

/**
 * Deterministic pseudo-random number generator using xorshift128+
 */
export class SeededRandom {
  private s0: bigint;
  private s1: bigint;

  constructor(seed: bigint) {
    // Seed both halves with splitmix64 steps
    let state = (seed + 0x9e3779b97f4a7c15n) & MASK_64;
    this.s0 = SeededRandom.mix(state);
    state = (state + 0x9e3779b97f4a7c15n) & MASK_64;
    this.s1 = SeededRandom.mix(state);

    if (this.s0 === 0n && this.s1 === 0n) {
      this.s1 = 1n;
    }
  }

  private static mix(value: bigint): bigint {
    let z = value;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
    return z ^ (z >> 31n);
  }

  /**
   * Next float in [0, 1)
   */
  next(): number {
    const result = (this.s0 + this.s1) & MASK_64;

    const s1 = this.s0 ^ this.s1;
    this.s0 = (((this.s0 << 55n) | (this.s0 >> 9n)) ^ s1 ^ (s1 << 14n)) & MASK_64;
    this.s1 = ((s1 << 36n) | (s1 >> 28n)) & MASK_64;

    return Number(result & 0x1fffffffffffffn) / 0x20000000000000;
  }

  /**
   * Integer in [min, max]
   */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /**
   * Integer in [0, bound)
   */
  below(bound: number): number {
    return Math.floor(this.next() * bound);
  }

  randomRgb(): RGB {
    return [this.nextInt(0, 255), this.nextInt(0, 255), this.nextInt(0, 255)];
  }

  /**
   * Random seed from the platform RNG, for runs without a configured seed
   */
  static randomSeed(): bigint {
    return BigInt(Math.floor(Math.random() * Number.MAX_SAFE_INTEGER));
  }
}
