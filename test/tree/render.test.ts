import { expect } from "chai";
import { describe, it } from "mocha";

import { prettyPrintTree } from "../../lib/tree/render.js";
import { empty, fromValues } from "../../lib/tree/tree.js";

describe("prettyPrintTree", () => {
  it("renders the empty tree as a dot", () => {
    expect(prettyPrintTree(empty())).to.equal(".");
  });

  it("renders a balanced shape", () => {
    expect(prettyPrintTree(fromValues([2, 1, 3]))).to.equal(
      "((. 1 .) 2 (. 3 .))",
    );
  });

  it("shows how sorted input degenerates", () => {
    expect(prettyPrintTree(fromValues([1, 2, 3]))).to.equal(
      "(. 1 (. 2 (. 3 .)))",
    );
  });

  it("shows duplicates on the right", () => {
    expect(prettyPrintTree(fromValues([4, 4]))).to.equal("(. 4 (. 4 .))");
  });

  it("uses the value renderer it is given", () => {
    const tree = fromValues(["b", "a"]);
    expect(prettyPrintTree(tree, (s) => JSON.stringify(s))).to.equal(
      '((. "a" .) "b" .)',
    );
  });
});
