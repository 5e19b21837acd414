import { describe, it, expect } from "vitest";
import { FMIndexError, InvalidArgumentError, isInvalidArgument } from "./errors.js";

describe("InvalidArgumentError", () => {
  it("should carry a stable name and code", () => {
    const err = new InvalidArgumentError("pattern", "must not be empty");
    expect(err.name).toBe("InvalidArgumentError");
    expect(err.code).toBe("INVALID_ARGUMENT");
    expect(err.argument).toBe("pattern");
    expect(err.reason).toBe("must not be empty");
    expect(err.message).toBe('Invalid argument "pattern": must not be empty');
  });

  it("should extend the base error classes", () => {
    const err = new InvalidArgumentError("text", "must not be empty");
    expect(err).toBeInstanceOf(FMIndexError);
    expect(err).toBeInstanceOf(Error);
  });

  it("should keep the cause", () => {
    const cause = new Error("underlying");
    const err = new InvalidArgumentError("options", "bad", { cause });
    expect(err.cause).toBe(cause);
  });
});

describe("isInvalidArgument", () => {
  it("should recognise only InvalidArgumentError", () => {
    expect(isInvalidArgument(new InvalidArgumentError("index", "out of range"))).toBe(true);
    expect(isInvalidArgument(new Error("other"))).toBe(false);
    expect(isInvalidArgument("text")).toBe(false);
  });
});
