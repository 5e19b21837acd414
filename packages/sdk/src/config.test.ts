import { describe, it, expect } from "vitest";
import { resolveOptions, suffixArrayFromEnv } from "./config.js";
import { InvalidArgumentError } from "./errors.js";

describe("resolveOptions", () => {
  it("should fill in defaults", () => {
    expect(resolveOptions({}, {})).toEqual({
      name: "default",
      sentinel: "$",
      suffixArray: "doubling",
      metrics: true,
    });
  });

  it("should keep explicit options", () => {
    expect(
      resolveOptions({ name: "notes", sentinel: "\u0000", suffixArray: "naive", metrics: false }, {})
    ).toEqual({ name: "notes", sentinel: "\u0000", suffixArray: "naive", metrics: false });
  });

  it("should read the suffix array method from the environment", () => {
    expect(resolveOptions({}, { FMINDEX_SUFFIX_ARRAY: " Naive " }).suffixArray).toBe("naive");
  });

  it("should prefer the explicit option over the environment", () => {
    expect(
      resolveOptions({ suffixArray: "doubling" }, { FMINDEX_SUFFIX_ARRAY: "naive" }).suffixArray
    ).toBe("doubling");
  });

  it("should reject a multi-character sentinel", () => {
    expect(() => resolveOptions({ sentinel: "ab" }, {})).toThrow(
      'Invalid argument "options": sentinel: sentinel must be exactly one character'
    );
  });

  it("should reject an empty name", () => {
    expect(() => resolveOptions({ name: "" }, {})).toThrow(InvalidArgumentError);
  });

  it("should attach the validation issues as the cause", () => {
    try {
      resolveOptions({ sentinel: "" }, {});
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InvalidArgumentError);
      expect(err instanceof InvalidArgumentError && err.cause).toBeTruthy();
    }
  });
});

describe("suffixArrayFromEnv", () => {
  it("should return undefined when unset or empty", () => {
    expect(suffixArrayFromEnv({})).toBeUndefined();
    expect(suffixArrayFromEnv({ FMINDEX_SUFFIX_ARRAY: "" })).toBeUndefined();
  });

  it("should reject unknown methods", () => {
    expect(() => suffixArrayFromEnv({ FMINDEX_SUFFIX_ARRAY: "fast" })).toThrow(
      'Invalid argument "FMINDEX_SUFFIX_ARRAY": expected "naive" or "doubling", got "fast"'
    );
  });
});
