import seedrandom from 'seedrandom';

/**
 * Pseudo-random source used by the traversal.
 *
 * Seeds are unsigned 64-bit integers. A seed is reduced with `BigInt.asUintN(64, …)`
 * and its decimal form keys a `seedrandom` (ARC4) generator, so the same seed always
 * yields the same sequence. Without a seed, `seedrandom` autoseeds from the platform
 * entropy source and successive mazes differ.
 *
 * Reproducibility holds within this library only; the sequence is not meant to match
 * any other implementation bit for bit.
 *
 * Not cryptographically secure.
 *
 * @module maze.random
 */

/** Returns a float in [0, 1). */
export type RandomFn = () => number;

/** Accepted seed forms. Numbers must be integers; both forms wrap to 64 bits. */
export type MazeSeed = number | bigint;

/**
 * Reduce a seed to an unsigned 64-bit integer.
 *
 * @example
 * normalizeSeed(-1); // 18446744073709551615n
 */
export function normalizeSeed(seed: MazeSeed): bigint {
  if (typeof seed === 'number' && !Number.isInteger(seed)) {
    throw new RangeError(`Seed must be an integer, got ${seed}`);
  }
  return BigInt.asUintN(64, BigInt(seed));
}

/**
 * Create a random source: deterministic for a given seed, entropy-seeded otherwise.
 */
export function createRandom(seed?: MazeSeed): RandomFn {
  if (seed === undefined) return seedrandom();
  return seedrandom(normalizeSeed(seed).toString());
}

/**
 * Unbiased Fisher–Yates shuffle, walking from the last index down to 1 and drawing
 * `j = floor(random() * (i + 1))` at each step. Mutates and returns `items`.
 */
export function shuffleInPlace<T>(items: T[], random: RandomFn): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
