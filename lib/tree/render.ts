/**
 * Textual rendering of a tree's shape.
 *
 * EBNF of the output:
 *
 * tree = "." | "(", tree, " ", value, " ", tree, ")"
 *
 * @module
 */
import type { Tree } from "./tree.js";

/**
 * Renders the shape of `tree`, e.g. `((. 1 .) 2 (. 3 .))` for the tree built
 * by inserting 2, 1 and 3.
 *
 * @param tree the tree to print
 * @param show renders a single value; defaults to `String`
 */
export const prettyPrintTree = <T>(
  tree: Tree<T>,
  show: (value: T) => string = String,
): string => {
  const out: string[] = [];
  // The stack holds subtrees still to render or literal text to emit.
  const stack: (Tree<T> | string)[] = [tree];

  for (let item = stack.pop(); item !== undefined; item = stack.pop()) {
    if (typeof item === "string") {
      out.push(item);
    } else if (item.kind === "empty") {
      out.push(".");
    } else {
      // Push in reverse (LIFO) so that "(" comes out first.
      stack.push(")", item.right, ` ${show(item.value)} `, item.left, "(");
    }
  }

  return out.join("");
};
