/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap } from "./result.js";

describe("Result", () => {
  describe("map", () => {
    it("should map ok value", () => {
      const mapped = map(ok<number, string>(5), (x) => x * 2);

      expect(mapped).to.deep.equal({ ok: true, value: 10 });
    });

    it("should pass through error", () => {
      const mapped = map(error<number, string>("Error"), (x) => x * 2);

      expect(mapped).to.deep.equal({ ok: false, error: "Error" });
    });
  });

  describe("flatMap", () => {
    it("should chain a failing step", () => {
      const mapped = flatMap(ok<number, string>(5), (x) =>
        x > 10 ? ok<number, string>(x) : error<number, string>("Too small")
      );

      expect(mapped).to.deep.equal({ ok: false, error: "Too small" });
    });

    it("should not run the step after an error", () => {
      let called = false;
      const mapped = flatMap(error<number, string>("Original"), (x) => {
        called = true;
        return ok<number, string>(x);
      });

      expect(called).to.equal(false);
      expect(mapped).to.deep.equal({ ok: false, error: "Original" });
    });
  });
});
