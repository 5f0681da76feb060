/**
 * ordered-tree: a persistent, unbalanced binary search tree.
 *
 * This module re-exports the public API:
 * - the tree type with insertion, in-order traversal and queries
 * - orderings, including partial ones, and the error they raise
 * - a multiset wrapper that carries its ordering
 * - seeded random insertion sequences
 *
 * @example
 * ```ts
 * import { empty, insert, traverse } from "ordered-tree";
 *
 * let tree = empty<number>();
 * for (const n of [3, 7, 1, 5, 2, 6, 4]) {
 *   tree = insert(n, tree);
 * }
 * console.log(traverse(tree)); // [1, 2, 3, 4, 5, 6, 7]
 * ```
 *
 * @module
 */

// Tree exports
export {
  count,
  depth,
  empty,
  type EmptyTree,
  fromValues,
  insert,
  insertAll,
  isEmpty,
  isOrdered,
  maximum,
  member,
  minimum,
  node,
  size,
  traverse,
  type Tree,
  type TreeNode,
  values,
} from "./tree/tree.js";

/** Renders the shape of a tree, e.g. `((. 1 .) 2 (. 3 .))`. */
export { prettyPrintTree } from "./tree/render.js";

// Ordering exports
export {
  type Comparator,
  compareBy,
  isOrderable,
  naturalOrder,
  type Orderable,
  type Ordering,
  orderOf,
  type PartialComparator,
  reverseOrder,
  tryOrderOf,
} from "./tree/comparator.js";
export { IncomparableValuesError } from "./tree/incomparableValuesError.js";

// Multiset exports
export {
  countMultiset,
  createMultiset,
  insertMultiset,
  memberMultiset,
  type OrderedMultiset,
  multisetSize,
  multisetToArray,
} from "./data/multiset/multiset.js";

// Generator exports
export {
  randomInsertionOrder,
  type RandomSource,
  randomTree,
  shuffle,
} from "./tree/generator.js";
