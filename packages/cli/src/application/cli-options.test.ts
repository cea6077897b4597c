import { InvalidArgumentError } from "commander";
import { describe, expect, it } from "vitest";
import { collectValues, parseCommitLimit, parseLineNumber, resolveSortOrder } from "./cli-options.js";

describe("parseLineNumber", () => {
  it("accepts positive integers", () => {
    expect(parseLineNumber("42")).toBe(42);
    expect(parseLineNumber(" 7 ")).toBe(7);
  });

  it("rejects zero, negatives and non-numeric input", () => {
    for (const value of ["0", "-3", "1.5", "abc", ""]) {
      expect(() => parseLineNumber(value)).toThrow(InvalidArgumentError);
    }
  });
});

describe("parseCommitLimit", () => {
  it("names the option in its error", () => {
    expect(() => parseCommitLimit("none")).toThrow("limit must be a positive integer.");
  });
});

describe("collectValues", () => {
  it("accumulates repeated option values", () => {
    expect(collectValues("b", collectValues("a", []))).toEqual(["a", "b"]);
  });
});

describe("resolveSortOrder", () => {
  it("lets --reverse force descending order", () => {
    expect(resolveSortOrder("asc", true)).toBe("desc");
    expect(resolveSortOrder("asc", undefined)).toBe("asc");
    expect(resolveSortOrder("desc", false)).toBe("desc");
  });
});
