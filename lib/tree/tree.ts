/**
 * A persistent, unbalanced binary search tree.
 *
 * - `Empty`: the absence of a value
 * - `Node`: one value and two subtrees; everything on the left compares
 *   strictly less than `value`, everything on the right compares greater
 *   than or equal to it
 *
 * Equal values go right, so duplicates are kept. There is no rebalancing:
 * the shape of a tree is a direct function of the order its values were
 * inserted in, and inserting sorted input yields a tree as deep as it is
 * large.
 *
 * @example
 * ```ts
 * import { fromValues, traverse } from "ordered-tree";
 *
 * const tree = fromValues([3, 7, 1, 5, 2, 6, 4]);
 * console.log(traverse(tree)); // [1, 2, 3, 4, 5, 6, 7]
 * ```
 *
 * @module
 */
import {
  naturalOrder,
  orderOf,
  type PartialComparator,
  tryOrderOf,
} from "./comparator.js";

export interface EmptyTree {
  readonly kind: "empty";
}

export interface TreeNode<T> {
  readonly kind: "node";
  readonly value: T;
  readonly left: Tree<T>;
  readonly right: Tree<T>;
}

export type Tree<T> = EmptyTree | TreeNode<T>;

const EMPTY: EmptyTree = Object.freeze<EmptyTree>({ kind: "empty" });

/** The empty tree. Every empty tree is the same value. */
export const empty = <T>(): Tree<T> => EMPTY;

/**
 * Builds a node around two existing subtrees. The ordering invariant is not
 * checked; see {@link isOrdered}.
 */
export const node = <T>(
  value: T,
  left: Tree<T>,
  right: Tree<T>,
): TreeNode<T> => ({
  kind: "node",
  value,
  left,
  right,
});

export const isEmpty = <T>(tree: Tree<T>): tree is EmptyTree =>
  tree.kind === "empty";

/**
 * Insert `item` into `tree` (persistent, immutable).
 *
 * Only the nodes on the path from the root down to the new leaf are rebuilt;
 * every other subtree is shared with the input tree, which is left as it was.
 *
 * @param item   The value to insert.
 * @param tree   The original tree.
 * @param order  Ordering for T. Defaults to {@link naturalOrder}.
 * @returns A **new** tree holding every value of `tree` plus `item`.
 * @throws IncomparableValuesError if `order` cannot relate `item` to a value
 *   on the way down. Nothing has been built at that point.
 */
export function insert<T>(
  item: T,
  tree: Tree<T>,
  order: PartialComparator<T> = naturalOrder,
): Tree<T> {
  interface PathItem {
    parent: TreeNode<T>;
    direction: "L" | "R";
  }

  const path: PathItem[] = [];
  let current = tree;

  while (current.kind === "node") {
    if (orderOf(order, item, current.value) < 0) {
      path.push({ parent: current, direction: "L" });
      current = current.left;
    } else {
      // ties go right
      path.push({ parent: current, direction: "R" });
      current = current.right;
    }
  }

  // Rebuild the path bottom-up around the new leaf
  let subtree: Tree<T> = node(item, EMPTY, EMPTY);
  for (let top = path.pop(); top !== undefined; top = path.pop()) {
    const { parent, direction } = top;
    subtree = direction === "L"
      ? node(parent.value, subtree, parent.right)
      : node(parent.value, parent.left, subtree);
  }

  return subtree;
}

/**
 * Inserts every element of `items`, left to right.
 *
 * If an element cannot be ordered the error propagates and no tree is
 * returned; `tree` itself is never touched.
 */
export function insertAll<T>(
  items: Iterable<T>,
  tree: Tree<T>,
  order: PartialComparator<T> = naturalOrder,
): Tree<T> {
  let result = tree;
  for (const item of items) {
    result = insert(item, result, order);
  }
  return result;
}

/** Builds a tree by inserting `items` into the empty tree, in order. */
export const fromValues = <T>(
  items: Iterable<T>,
  order: PartialComparator<T> = naturalOrder,
): Tree<T> => insertAll(items, empty<T>(), order);

/**
 * Return an array of all values in ascending order (in-order traversal).
 * Duplicates appear as many times as they were inserted.
 */
export function traverse<T>(tree: Tree<T>): T[] {
  const result: T[] = [];
  const stack: TreeNode<T>[] = [];

  let current = tree;

  while (stack.length > 0 || current.kind === "node") {
    if (current.kind === "node") {
      // Traverse left subtree
      stack.push(current);
      current = current.left;
    } else {
      // Pop from stack, emit the node's value,
      // then move to the right subtree
      const next = stack.pop();
      if (next) {
        result.push(next.value);
        current = next.right;
      }
    }
  }

  return result;
}

/**
 * Lazily yields the same sequence as {@link traverse}. Each call starts a
 * fresh traversal.
 */
export function* values<T>(tree: Tree<T>): Generator<T, void, undefined> {
  const stack: TreeNode<T>[] = [];
  let current = tree;

  for (;;) {
    while (current.kind === "node") {
      stack.push(current);
      current = current.left;
    }
    const next = stack.pop();
    if (next === undefined) {
      return;
    }
    yield next.value;
    current = next.right;
  }
}

/** The number of values in the tree, counting duplicates. */
export function size<T>(tree: Tree<T>): number {
  let total = 0;
  const stack: Tree<T>[] = [tree];

  for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
    if (top.kind === "node") {
      total++;
      stack.push(top.left, top.right);
    }
  }

  return total;
}

/**
 * The number of nodes on the longest path from the root to a leaf.
 * `0` for the empty tree.
 */
export function depth<T>(tree: Tree<T>): number {
  let deepest = 0;
  const stack: [Tree<T>, number][] = [[tree, 0]];

  for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
    const [subtree, level] = top;
    if (subtree.kind === "empty") {
      deepest = Math.max(deepest, level);
    } else {
      stack.push([subtree.left, level + 1], [subtree.right, level + 1]);
    }
  }

  return deepest;
}

/**
 * Counts the values comparing equal to `item`.
 *
 * Every such value lies on the search path for `item`: equal values sit to
 * the right of each other, so the search keeps going right after a match.
 *
 * @throws IncomparableValuesError on a pair `order` cannot relate.
 */
export function count<T>(
  item: T,
  tree: Tree<T>,
  order: PartialComparator<T> = naturalOrder,
): number {
  let found = 0;
  let current = tree;

  while (current.kind === "node") {
    const cmp = orderOf(order, item, current.value);
    if (cmp < 0) {
      current = current.left;
    } else {
      if (cmp === 0) found++;
      current = current.right;
    }
  }

  return found;
}

/**
 * Whether a value comparing equal to `item` is present.
 *
 * @throws IncomparableValuesError on a pair `order` cannot relate.
 */
export function member<T>(
  item: T,
  tree: Tree<T>,
  order: PartialComparator<T> = naturalOrder,
): boolean {
  let current = tree;
  while (current.kind === "node") {
    const cmp = orderOf(order, item, current.value);
    if (cmp === 0) {
      return true;
    }
    current = cmp < 0 ? current.left : current.right;
  }
  return false;
}

/** The leftmost (smallest) value, or undefined for the empty tree. */
export function minimum<T>(tree: Tree<T>): T | undefined {
  if (tree.kind === "empty") return undefined;
  let current = tree;
  while (current.left.kind === "node") {
    current = current.left;
  }
  return current.value;
}

/**
 * The rightmost value, or undefined for the empty tree. With duplicates of
 * the maximum present this is the one inserted last.
 */
export function maximum<T>(tree: Tree<T>): T | undefined {
  if (tree.kind === "empty") return undefined;
  let current = tree;
  while (current.right.kind === "node") {
    current = current.right;
  }
  return current.value;
}

/**
 * Checks the search-tree invariant everywhere in `tree`: every value in a
 * left subtree strictly below its ancestor, every value in a right subtree
 * at or above it. A pair `order` cannot relate makes the tree unordered.
 */
export function isOrdered<T>(
  tree: Tree<T>,
  order: PartialComparator<T> = naturalOrder,
): boolean {
  interface Bounded {
    subtree: Tree<T>;
    // inclusive
    lower?: { value: T };
    // exclusive
    upper?: { value: T };
  }

  const stack: Bounded[] = [{ subtree: tree }];

  for (let top = stack.pop(); top !== undefined; top = stack.pop()) {
    const { subtree, lower, upper } = top;
    if (subtree.kind === "empty") continue;

    if (lower !== undefined) {
      const cmp = tryOrderOf(order, subtree.value, lower.value);
      if (cmp === undefined || cmp < 0) return false;
    }
    if (upper !== undefined) {
      const cmp = tryOrderOf(order, subtree.value, upper.value);
      if (cmp === undefined || cmp >= 0) return false;
    }

    const here = { value: subtree.value };
    stack.push(
      { subtree: subtree.left, lower, upper: here },
      { subtree: subtree.right, lower: here, upper },
    );
  }

  return true;
}
