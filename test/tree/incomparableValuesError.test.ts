import { expect } from "chai";
import { describe, it } from "mocha";

import { IncomparableValuesError } from "../../lib/tree/incomparableValuesError.js";

describe("IncomparableValuesError", () => {
  it("should be an instance of Error", () => {
    const error = new IncomparableValuesError(NaN, 1);
    expect(error).to.be.an.instanceof(Error);
    expect(error.name).to.equal("IncomparableValuesError");
  });

  it("should describe and keep both values", () => {
    const error = new IncomparableValuesError("a", 2);
    expect(error.message).to.equal("cannot order a relative to 2");
    expect(error.item).to.equal("a");
    expect(error.value).to.equal(2);
    expect(String(error)).to.equal(
      "IncomparableValuesError: cannot order a relative to 2",
    );
  });
});
