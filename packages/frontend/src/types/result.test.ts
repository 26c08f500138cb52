/**
 * Tests for Result type
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { ok, error, map, flatMap, mapError, unwrapOr } from "./result.js";

describe("Result", () => {
  it("should carry an ok value", () => {
    const result = ok<string, string>("rt:core");
    expect(result).to.deep.equal({ ok: true, value: "rt:core" });
  });

  it("should carry an error value", () => {
    const result = error<string, string>("not found");
    expect(result).to.deep.equal({ ok: false, error: "not found" });
  });

  describe("map", () => {
    it("should transform an ok value", () => {
      const mapped = map(ok<string, string>("unit A"), (s) => s.length);
      expect(mapped).to.deep.equal({ ok: true, value: 6 });
    });

    it("should pass an error through untouched", () => {
      const mapped = map(error<string, string>("missing"), (s) => s.length);
      expect(mapped).to.deep.equal({ ok: false, error: "missing" });
    });
  });

  describe("flatMap", () => {
    it("should chain a failing step", () => {
      const chained = flatMap(ok<number, string>(0), (n) =>
        n > 0 ? ok<number, string>(n) : error<number, string>("empty chain")
      );
      expect(chained).to.deep.equal({ ok: false, error: "empty chain" });
    });

    it("should not run the step on an error", () => {
      let called = false;
      const chained = flatMap(error<number, string>("first"), (n) => {
        called = true;
        return ok<number, string>(n);
      });
      expect(called).to.equal(false);
      expect(chained).to.deep.equal({ ok: false, error: "first" });
    });
  });

  it("should map the error side with mapError", () => {
    const mapped = mapError(error<number, string>("sealed"), (e) =>
      e.toUpperCase()
    );
    expect(mapped).to.deep.equal({ ok: false, error: "SEALED" });
  });

  it("should fall back with unwrapOr", () => {
    expect(unwrapOr(ok<number, string>(512), 0)).to.equal(512);
    expect(unwrapOr(error<number, string>("bad"), 0)).to.equal(0);
  });
});
