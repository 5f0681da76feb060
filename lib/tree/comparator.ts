/**
 * Orderings over tree elements.
 *
 * A total order is a plain `(a, b) => number` comparator. A partial order may
 * additionally answer `undefined` (or `NaN`) for a pair it cannot relate.
 *
 * @module
 */
import { IncomparableValuesError } from "./incomparableValuesError.js";

/** Return <0 if a<b, 0 if a==b, >0 if a>b. */
export type Comparator<T> = (a: T, b: T) => number;

/** Like {@link Comparator}, but `undefined` or `NaN` means incomparable. */
export type PartialComparator<T> = (a: T, b: T) => number | undefined;

/** The element types the natural order knows how to compare. */
export type Orderable = number | string | bigint | Date;

export type Ordering = -1 | 0 | 1;

export const isOrderable = (v: unknown): v is Orderable =>
  typeof v === "number" || typeof v === "string" || typeof v === "bigint" ||
  v instanceof Date;

/**
 * Orders numbers, strings, bigints and Dates with the relational operators.
 *
 * Dates compare by timestamp, against each other or against numbers. Any
 * other mix of kinds is incomparable, and so is NaN (including an invalid
 * Date).
 */
export const naturalOrder = (a: unknown, b: unknown): number | undefined => {
  if (!isOrderable(a) || !isOrderable(b)) {
    return undefined;
  }

  const x = a instanceof Date ? a.getTime() : a;
  const y = b instanceof Date ? b.getTime() : b;

  if (typeof x === "number" && typeof y === "number") {
    if (Number.isNaN(x) || Number.isNaN(y)) return undefined;
    return x < y ? -1 : x > y ? 1 : 0;
  } else if (typeof x === "string" && typeof y === "string") {
    return x < y ? -1 : x > y ? 1 : 0;
  } else if (typeof x === "bigint" && typeof y === "bigint") {
    return x < y ? -1 : x > y ? 1 : 0;
  } else {
    return undefined;
  }
};

/**
 * Derives an ordering from a key projection.
 *
 * @example
 * ```ts
 * const byAge = compareBy((p: Person) => p.age);
 * ```
 */
export const compareBy = <T, K>(
  key: (value: T) => K,
  order: PartialComparator<K> = naturalOrder,
): PartialComparator<T> =>
(a, b) => order(key(a), key(b));

/** Flips an ordering. Incomparable pairs stay incomparable. */
export const reverseOrder = <T>(
  order: PartialComparator<T>,
): PartialComparator<T> =>
(a, b) => {
  const result = order(a, b);
  return result === undefined ? undefined : -result;
};

/**
 * Resolves `order(a, b)` to its sign, or `undefined` if the ordering cannot
 * relate the pair.
 */
export const tryOrderOf = <T>(
  order: PartialComparator<T>,
  a: T,
  b: T,
): Ordering | undefined => {
  const result = order(a, b);
  if (result === undefined || Number.isNaN(result)) return undefined;
  if (result < 0) return -1;
  if (result > 0) return 1;
  return 0;
};

/**
 * Resolves `order(a, b)` to its sign.
 *
 * @throws IncomparableValuesError when the ordering cannot relate the pair.
 */
export const orderOf = <T>(
  order: PartialComparator<T>,
  a: T,
  b: T,
): Ordering => {
  const result = tryOrderOf(order, a, b);
  if (result === undefined) {
    throw new IncomparableValuesError(a, b);
  }
  return result;
};
