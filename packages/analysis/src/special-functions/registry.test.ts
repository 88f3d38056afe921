/**
 * Tests for the special function registry
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createVersion } from "@introgen/frontend";
import { SpecialFunctions } from "./registry.js";

describe("SpecialFunctions", () => {
  it("should list traits in operation kind order", () => {
    const specials = new SpecialFunctions();
    specials.setTrait("hash", { sourceFunctionName: "a_hash" });
    specials.setTrait("format", { sourceFunctionName: "a_to_string" });
    specials.setTrait("compare", { sourceFunctionName: "a_compare" });

    expect(specials.traits().map(([kind]) => kind)).to.deep.equal([
      "compare",
      "format",
      "hash",
    ]);
  });

  it("should list functions in raw name order", () => {
    const specials = new SpecialFunctions();
    specials.setFunction("a_type_to_string", { kind: "staticStringify" });
    specials.setFunction("a_type_get_nick", {
      kind: "staticStringify",
      version: createVersion(1, 2),
    });

    expect(specials.functions().map(([name]) => name)).to.deep.equal([
      "a_type_get_nick",
      "a_type_to_string",
    ]);
  });

  it("should replace a trait set twice", () => {
    const specials = new SpecialFunctions();
    specials.setTrait("equal", { sourceFunctionName: "a_equal" });
    specials.setTrait("equal", {
      sourceFunctionName: "a_is_equal",
      version: createVersion(1, 8),
    });

    expect(specials.traits()).to.have.length(1);
    expect(specials.getTrait("equal")).to.deep.equal({
      sourceFunctionName: "a_is_equal",
      version: createVersion(1, 8),
    });
    expect(specials.hasTrait("hash")).to.equal(false);
  });
});
