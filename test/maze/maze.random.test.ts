import { createRandom, normalizeSeed, shuffleInPlace } from '../../src/maze/maze.random';

function sample(random: () => number, n: number): number[] {
  return Array.from({ length: n }, () => random());
}

describe('maze.random', () => {
  describe('Scenario: seed normalisation', () => {
    it('wraps negative numbers to unsigned 64-bit', () => {
      expect(normalizeSeed(-1)).toBe(18446744073709551615n);
    });
    it('reduces bigints modulo 2^64', () => {
      expect(normalizeSeed(2n ** 64n + 5n)).toBe(5n);
    });
    it('keeps small integers', () => {
      expect(normalizeSeed(42)).toBe(42n);
    });
    it('rejects fractional seeds', () => {
      expect(() => normalizeSeed(1.5)).toThrow(RangeError);
    });
  });

  describe('Scenario: reproducible sequences', () => {
    it('same seed yields the same sequence', () => {
      expect(sample(createRandom(42), 8)).toEqual(sample(createRandom(42), 8));
    });
    it('number and bigint forms of a seed agree', () => {
      expect(sample(createRandom(7), 4)).toEqual(sample(createRandom(7n), 4));
    });
    it('seeds equal modulo 2^64 agree', () => {
      expect(sample(createRandom(-1), 4)).toEqual(sample(createRandom(2n ** 64n - 1n), 4));
    });
    it('different seeds diverge', () => {
      expect(sample(createRandom(1), 8)).not.toEqual(sample(createRandom(2), 8));
    });
    it('produces values in [0, 1)', () => {
      const values = sample(createRandom(3), 200);
      expect(values.every((v) => v >= 0 && v < 1)).toBe(true);
    });
    it('unseeded sources produce values in [0, 1)', () => {
      const values = sample(createRandom(), 50);
      expect(values.every((v) => v >= 0 && v < 1)).toBe(true);
    });
    it('unseeded sources draw different sequences', () => {
      expect(sample(createRandom(), 8)).not.toEqual(sample(createRandom(), 8));
    });
  });

  describe('Scenario: Fisher-Yates shuffle', () => {
    it('draw of 0 at every step rotates the first item to the back', () => {
      // i=3 swaps 3<->0, i=2 swaps 2<->0, i=1 swaps 1<->0
      expect(shuffleInPlace(['L', 'R', 'T', 'B'], () => 0)).toEqual(['R', 'T', 'B', 'L']);
    });
    it('draw just below 1 leaves the order unchanged', () => {
      expect(shuffleInPlace(['L', 'R', 'T', 'B'], () => 0.999)).toEqual(['L', 'R', 'T', 'B']);
    });
    it('shuffles in place', () => {
      const items = [1, 2, 3];
      expect(shuffleInPlace(items, () => 0.5)).toBe(items);
    });
    it('draws once per index above 0', () => {
      let draws = 0;
      shuffleInPlace([1, 2, 3, 4], () => {
        draws++;
        return 0.25;
      });
      expect(draws).toBe(3);
    });
    it('keeps every element', () => {
      const shuffled = shuffleInPlace([1, 2, 3, 4, 5, 6], createRandom(11));
      expect([...shuffled].sort()).toEqual([1, 2, 3, 4, 5, 6]);
    });
    it('handles an empty list', () => {
      expect(shuffleInPlace([], () => 0)).toEqual([]);
    });
  });
});
