import { describe, expect, it } from 'vitest';
import { SeededRandom, randomSeed } from './random';

describe('SeededRandom', () => {
  it('produces the same sequence for the same seed', () => {
    const a = new SeededRandom(1234);
    const b = new SeededRandom(1234);
    const seqA = Array.from({ length: 10 }, () => a.next());
    const seqB = Array.from({ length: 10 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it('resumes from a stored state', () => {
    const original = new SeededRandom(99);
    original.next();
    original.next();
    const resumed = new SeededRandom(original.state);
    expect(resumed.next()).toBe(original.next());
    expect(resumed.next()).toBe(original.next());
  });

  it('keeps next() in [0, 1) and nextInt() in range', () => {
    const random = new SeededRandom(7);
    for (let i = 0; i < 500; i++) {
      const f = random.next();
      expect(f).toBeGreaterThanOrEqual(0);
      expect(f).toBeLessThan(1);
      const n = random.nextInt(5);
      expect(Number.isInteger(n)).toBe(true);
      expect(n).toBeGreaterThanOrEqual(0);
      expect(n).toBeLessThan(5);
    }
  });

  it('rejects empty ranges', () => {
    const random = new SeededRandom(1);
    expect(() => random.nextInt(0)).toThrow(RangeError);
    expect(() => random.pick([])).toThrow(RangeError);
  });

  it('shuffles into a permutation without touching the input', () => {
    const random = new SeededRandom(3);
    const input = [1, 2, 3, 4, 5, 6];
    const shuffled = random.shuffle(input);
    expect(input).toEqual([1, 2, 3, 4, 5, 6]);
    expect([...shuffled].sort((x, y) => x - y)).toEqual(input);
  });
});

describe('randomSeed', () => {
  it('returns a uint32', () => {
    const seed = randomSeed();
    expect(Number.isInteger(seed)).toBe(true);
    expect(seed).toBeGreaterThanOrEqual(0);
    expect(seed).toBeLessThanOrEqual(0xFFFFFFFF);
  });
});
