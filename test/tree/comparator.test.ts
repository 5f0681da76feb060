import { assert, expect } from "chai";
import { describe, it } from "mocha";

import {
  compareBy,
  naturalOrder,
  orderOf,
  reverseOrder,
  tryOrderOf,
} from "../../lib/tree/comparator.js";
import { IncomparableValuesError } from "../../lib/tree/incomparableValuesError.js";

describe("naturalOrder", () => {
  it("orders numbers", () => {
    expect(naturalOrder(1, 2)).to.equal(-1);
    expect(naturalOrder(2, 1)).to.equal(1);
    expect(naturalOrder(2, 2)).to.equal(0);
    expect(naturalOrder(-0, 0)).to.equal(0);
  });

  it("orders strings by code unit", () => {
    expect(naturalOrder("a", "b")).to.equal(-1);
    expect(naturalOrder("B", "a")).to.equal(-1);
    expect(naturalOrder("same", "same")).to.equal(0);
  });

  it("orders bigints", () => {
    expect(naturalOrder(10n, 9n)).to.equal(1);
  });

  it("orders Dates by timestamp", () => {
    expect(naturalOrder(new Date(1000), new Date(2000))).to.equal(-1);
    expect(naturalOrder(new Date(1000), 1000)).to.equal(0);
  });

  it("cannot relate NaN, invalid Dates or mixed kinds", () => {
    assert.isUndefined(naturalOrder(NaN, 1));
    assert.isUndefined(naturalOrder(1, NaN));
    assert.isUndefined(naturalOrder(new Date("not a date"), new Date(0)));
    assert.isUndefined(naturalOrder("1", 1));
    assert.isUndefined(naturalOrder(1n, 1));
    assert.isUndefined(naturalOrder({}, {}));
  });
});

describe("compareBy", () => {
  it("orders by the projected key", () => {
    const byLength = compareBy((s: string) => s.length);
    expect(byLength("abc", "de")).to.equal(1);
    expect(byLength("ab", "de")).to.equal(0);
  });

  it("uses the ordering it is given for the keys", () => {
    const byNameDescending = compareBy(
      (p: { name: string }) => p.name,
      reverseOrder(naturalOrder),
    );
    expect(byNameDescending({ name: "a" }, { name: "b" })).to.equal(1);
  });
});

describe("reverseOrder", () => {
  it("flips the sign and keeps incomparable pairs incomparable", () => {
    const reversed = reverseOrder((a: number, b: number) => a - b);
    expect(reversed(1, 3)).to.equal(2);
    assert.isUndefined(reverseOrder(naturalOrder)(NaN, 1));
  });
});

describe("orderOf", () => {
  const subtract = (a: number, b: number) => a - b;

  it("reduces a comparison to its sign", () => {
    expect(orderOf(subtract, 10, 3)).to.equal(1);
    expect(orderOf(subtract, 3, 10)).to.equal(-1);
    expect(orderOf(subtract, 3, 3)).to.equal(0);
  });

  it("throws when the ordering cannot relate the pair", () => {
    expect(() => orderOf(subtract, NaN, 3)).to.throw(IncomparableValuesError);
    expect(() => orderOf(naturalOrder, "x", 3)).to.throw(
      IncomparableValuesError,
      "cannot order x relative to 3",
    );
  });

  it("has a non-throwing form", () => {
    assert.isUndefined(tryOrderOf(subtract, NaN, 3));
    expect(tryOrderOf(subtract, 4, 3)).to.equal(1);
  });
});
