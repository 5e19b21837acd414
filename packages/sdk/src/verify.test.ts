import { describe, it, expect } from "vitest";
import { splitChars } from "./alphabet.js";
import { buildGeneration } from "./build.js";
import { resolveOptions } from "./config.js";
import { verifyGeneration } from "./verify.js";
import type { IndexGeneration } from "./types.js";

const options = resolveOptions({ name: "verify-test", metrics: false }, {});

function bananaGeneration(): IndexGeneration {
  return buildGeneration(splitChars("banana$"), 0, options);
}

describe("verifyGeneration", () => {
  it("should accept a freshly built generation", () => {
    expect(verifyGeneration(bananaGeneration(), "$")).toEqual({
      ok: true,
      generation: 0,
      issues: [],
    });
  });

  it("should accept a text made of the sentinel alone", () => {
    const gen = buildGeneration(["$"], 3, options);
    expect(verifyGeneration(gen, "$").ok).toBe(true);
  });

  it("should report a suffix array that is not a permutation", () => {
    const gen = { ...bananaGeneration(), suffixArray: [6, 5, 3, 1, 0, 4, 4] };
    const report = verifyGeneration(gen, "$");
    expect(report.ok).toBe(false);
    expect(report.issues.map((issue) => issue.code)).toEqual(["permutation"]);
  });

  it("should report suffixes out of order", () => {
    const gen = { ...bananaGeneration(), suffixArray: [5, 6, 3, 1, 0, 4, 2] };
    expect(verifyGeneration(gen, "$").issues.map((issue) => issue.code)).toEqual(["order"]);
  });

  it("should report a broken C-table", () => {
    const base = bananaGeneration();
    const gen = { ...base, cTable: new Map<string, number>([...base.cTable, ["n", 4]]) };
    const report = verifyGeneration(gen, "$");
    expect(report.issues).toEqual([{ code: "c-table", message: 'C["n"] is 4, expected 5' }]);
  });

  it("should report a misplaced sentinel", () => {
    const gen = { ...bananaGeneration(), chars: splitChars("ban$ana") };
    const codes = verifyGeneration(gen, "$").issues.map((issue) => issue.code);
    expect(codes).toEqual(["sentinel"]);
  });

  it("should report a BWT holding two sentinels", () => {
    const gen = { ...bananaGeneration(), bwt: splitChars("annb$$a") };
    expect(verifyGeneration(gen, "$").issues).toEqual([
      { code: "sentinel", message: "BWT holds 2 sentinels, expected 1" },
    ]);
  });

  it("should report a rank row of the wrong length", () => {
    const base = bananaGeneration();
    const gen = {
      ...base,
      rankTable: new Map<string, readonly number[]>([...base.rankTable, ["a", [1, 1, 1]]]),
    };
    expect(verifyGeneration(gen, "$").issues).toEqual([
      { code: "length", message: 'rank row for "a" has length 3' },
    ]);
  });
});
