/**
 * Tests for stringify detection
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import type { FunctionInfo, TypeContext } from "@introgen/frontend";
import { isStringify } from "./stringify.js";
import { method, stringMethod } from "./test-harness.js";

const plain: TypeContext = {
  kind: "other",
  trustReturnValueNullability: false,
};

describe("isStringify", () => {
  it("should accept a non-null string accessor", () => {
    const func = stringMethod("get_name", false, "none");

    expect(isStringify(func, plain)).to.equal(true);
    expect(func.name).to.equal("get_name");
  });

  it("should reject functions with extra parameters", () => {
    const func: FunctionInfo = {
      ...stringMethod("to_string", false, "full"),
      parameters: [
        { name: "self", typeName: "TestObj", instanceParameter: true },
        { name: "flags", typeName: "guint", instanceParameter: false },
      ],
    };

    expect(isStringify(func, plain)).to.equal(false);
    expect(func.name).to.equal("to_string");
  });

  it("should reject a single non-instance parameter", () => {
    const func: FunctionInfo = {
      ...stringMethod("name", false, "none"),
      parameters: [{ name: "value", typeName: "gint", instanceParameter: false }],
    };

    expect(isStringify(func, plain)).to.equal(false);
  });

  it("should reject non-string and missing returns", () => {
    const counted = method("to_string", {
      ret: { typeName: "guint", nullable: false, transfer: "none" },
    });
    const noReturn = method("to_string");

    expect(isStringify(counted, plain)).to.equal(false);
    expect(isStringify(noReturn, plain)).to.equal(false);
    expect(counted.name).to.equal("to_string");
    expect(noReturn.name).to.equal("to_string");
  });

  it("should rename to_string and force it non-null on plain types", () => {
    const func = stringMethod("to_string", true, "full");

    expect(isStringify(func, plain)).to.equal(true);
    expect(func.name).to.equal("to_str");
    expect(func.ret?.nullable).to.equal(false);
  });

  it("should keep nullability when the type trusts its annotations", () => {
    const func = stringMethod("to_string", true, "full");

    expect(
      isStringify(func, { kind: "other", trustReturnValueNullability: true })
    ).to.equal(false);
    expect(func.name).to.equal("to_str");
    expect(func.ret?.nullable).to.equal(true);
  });

  it("should keep nullability on enumerations and bitfields", () => {
    const inEnum = stringMethod("to_string", true, "none");
    const inFlags = stringMethod("to_string", true, "none");

    expect(
      isStringify(inEnum, { kind: "enumeration", trustReturnValueNullability: false })
    ).to.equal(false);
    expect(
      isStringify(inFlags, { kind: "bitfield", trustReturnValueNullability: false })
    ).to.equal(false);
    expect(inEnum.name).to.equal("to_str");
    expect(inEnum.ret?.nullable).to.equal(true);
    expect(inFlags.ret?.nullable).to.equal(true);
  });

  it("should only override nullability for to_string", () => {
    const func = stringMethod("get_name", true, "none");

    expect(isStringify(func, plain)).to.equal(false);
    expect(func.ret?.nullable).to.equal(true);
  });
});
