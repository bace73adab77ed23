import { describe, it, expect } from 'vitest';
import { SeededRandom } from './seeded-random.js';

function take(rng: SeededRandom, count: number): number[] {
  return Array.from({ length: count }, () => rng.next());
}

describe('SeededRandom', () => {
  it('repeats the same sequence for the same seed', () => {
    expect(take(new SeededRandom(1234n), 20)).toEqual(take(new SeededRandom(1234n), 20));
  });

  it('diverges for different seeds', () => {
    expect(take(new SeededRandom(1n), 5)).not.toEqual(take(new SeededRandom(2n), 5));
  });

  it('stays in [0, 1)', () => {
    const rng = new SeededRandom(0n);
    for (const value of take(rng, 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it('produces integers within inclusive bounds', () => {
    const rng = new SeededRandom(77n);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const value = rng.nextInt(-2, 2);
      expect(Number.isInteger(value)).toBe(true);
      seen.add(value);
    }
    expect([...seen].sort((a, b) => a - b)).toEqual([-2, -1, 0, 1, 2]);
  });

  it('keeps below() under its bound', () => {
    const rng = new SeededRandom(5n);
    for (let i = 0; i < 200; i++) {
      const value = rng.below(3);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(3);
    }
  });

  it('makes byte-sized colour channels', () => {
    const [r, g, b] = new SeededRandom(9n).randomRgb();
    for (const channel of [r, g, b]) {
      expect(channel).toBeGreaterThanOrEqual(0);
      expect(channel).toBeLessThanOrEqual(255);
    }
  });
});
