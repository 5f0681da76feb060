import {
  naturalOrder,
  type PartialComparator,
} from "../../tree/comparator.js";
import {
  count,
  empty,
  insert,
  member,
  size,
  traverse,
  type Tree,
} from "../../tree/tree.js";

/**
 * A generic multiset implemented on top of an unbalanced search tree.
 *
 * Values comparing equal are all kept. The caller may supply an ordering for
 * T; otherwise the natural order is used.
 */
export interface OrderedMultiset<T> {
  readonly tree: Tree<T>;
  readonly compare: PartialComparator<T>;
}

/**
 * Creates an empty multiset.
 *
 * @param compare An ordering for values of type T.
 */
export function createMultiset<T>(
  compare: PartialComparator<T> = naturalOrder,
): OrderedMultiset<T> {
  return { tree: empty<T>(), compare };
}

/**
 * Inserts a value into the multiset.
 * Returns a new multiset instance; the original one is unchanged.
 *
 * @throws IncomparableValuesError if the ordering cannot place the value.
 */
export function insertMultiset<T>(
  ms: OrderedMultiset<T>,
  value: T,
): OrderedMultiset<T> {
  return { ...ms, tree: insert(value, ms.tree, ms.compare) };
}

/**
 * Checks whether the multiset holds at least one copy of a value.
 */
export function memberMultiset<T>(ms: OrderedMultiset<T>, value: T): boolean {
  return member(value, ms.tree, ms.compare);
}

/**
 * How many copies of a value the multiset holds.
 */
export function countMultiset<T>(ms: OrderedMultiset<T>, value: T): number {
  return count(value, ms.tree, ms.compare);
}

export function multisetSize<T>(ms: OrderedMultiset<T>): number {
  return size(ms.tree);
}

/**
 * Returns an array of all elements in ascending order, duplicates included.
 */
export function multisetToArray<T>(ms: OrderedMultiset<T>): T[] {
  return traverse(ms.tree);
}
