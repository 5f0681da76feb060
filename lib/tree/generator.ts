/**
 * Random insertion sequences.
 *
 * Generates values and permutations from a seeded random source, so that a
 * tree's shape can be reproduced from the seed alone.
 *
 * @module
 */
import { fromValues, type Tree } from "./tree.js";

/**
 * Simple interface for random number generation.
 * random-seed's `RandomSeed` satisfies it.
 */
export interface RandomSource {
  /** Returns a random integer between min (inclusive) and max (inclusive) */
  intBetween(min: number, max: number): number;
}

/**
 * Fisher–Yates shuffle.
 * @returns a new array; `items` is not modified.
 */
export const shuffle = <T>(rs: RandomSource, items: readonly T[]): T[] => {
  const result = items.slice();
  for (let i = result.length - 1; i > 0; i--) {
    const j = rs.intBetween(0, i);
    const tmp = result[i];
    result[i] = result[j];
    result[j] = tmp;
  }
  return result;
};

/**
 * @param rs the random source to use.
 * @param n how many values to draw.
 * @param max the largest value that may be drawn; the smallest is 0.
 * @returns `n` integers, duplicates possible.
 */
export const randomInsertionOrder = (
  rs: RandomSource,
  n: number,
  max: number,
): number[] => {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`count must be a non-negative integer, got ${n}`);
  }
  if (!Number.isInteger(max) || max < 0) {
    throw new RangeError(`max must be a non-negative integer, got ${max}`);
  }

  const result: number[] = [];
  for (let i = 0; i < n; i++) {
    result.push(rs.intBetween(0, max));
  }
  return result;
};

export const randomTree = (
  rs: RandomSource,
  n: number,
  max: number,
): Tree<number> => fromValues(randomInsertionOrder(rs, n, max));
