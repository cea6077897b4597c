import { describe, expect, it } from "vitest";
import type { GitCommit } from "@lineage/core";
import { isIgnoredCommit, isWithinDateWindow, normalizeIgnoreRevs } from "./commit-filters.js";

const commit: GitCommit = {
  hash: "9fceb02d0ae598e95dc970b74767f19372d61af8",
  authorName: "Alice",
  authoredAtUnix: 1_672_531_200,
  message: "",
  parentHashes: [],
};

describe("isIgnoredCommit", () => {
  it("matches full and abbreviated hashes case-insensitively", () => {
    expect(isIgnoredCommit(commit, normalizeIgnoreRevs([commit.hash]))).toBe(true);
    expect(isIgnoredCommit(commit, normalizeIgnoreRevs([" 9FCEB02D "]))).toBe(true);
    expect(isIgnoredCommit(commit, normalizeIgnoreRevs(["9fceb03"]))).toBe(false);
  });

  it("never treats blank entries as a prefix of everything", () => {
    expect(normalizeIgnoreRevs(["", "  "])).toEqual([]);
    expect(isIgnoredCommit(commit, normalizeIgnoreRevs([""]))).toBe(false);
  });
});

describe("isWithinDateWindow", () => {
  const at = commit.authoredAtUnix * 1000;

  it("includes both bounds", () => {
    expect(isWithinDateWindow(commit, { sinceMillis: at, untilMillis: at })).toBe(true);
  });

  it("excludes commits outside the window", () => {
    expect(isWithinDateWindow(commit, { sinceMillis: at + 1, untilMillis: null })).toBe(false);
    expect(isWithinDateWindow(commit, { sinceMillis: null, untilMillis: at - 1 })).toBe(false);
  });

  it("leaves missing bounds unconstrained", () => {
    expect(isWithinDateWindow(commit, { sinceMillis: null, untilMillis: null })).toBe(true);
  });
});
