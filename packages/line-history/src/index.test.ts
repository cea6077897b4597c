import { describe, expect, it } from "vitest";
import { RepositoryNotFoundError } from "@lineage/core";
import {
  getLineHistoryFromGit,
  InMemoryRepositoryBackend,
  InMemoryRepositoryBackendFactory,
  type LineHistoryProgressEvent,
  type LineHistoryQuery,
} from "./index.js";

const factory = new InMemoryRepositoryBackendFactory({
  "/work/app": new InMemoryRepositoryBackend([
    { hash: "r", authorName: "Alice", authoredAtUnix: 100, parentHashes: [], files: { "a.ts": "1" } },
    { hash: "h", authorName: "Bob", authoredAtUnix: 200, parentHashes: ["r"], files: { "a.ts": "2" } },
  ]),
});

const query: LineHistoryQuery = { filePath: "a.ts", lineNumber: 3, sortOrder: "desc", ignoreRevs: [] };

describe("getLineHistoryFromGit", () => {
  it("opens the repository through the given factory and extracts the history", () => {
    const stages: LineHistoryProgressEvent["stage"][] = [];
    const history = getLineHistoryFromGit(
      "/work/app",
      query,
      { maxCommits: null },
      (event) => stages.push(event.stage),
      factory,
    );

    expect(history.events.map((event) => [event.commitHash, event.changeType])).toEqual([
      ["h", "Modified"],
      ["r", "Created"],
    ]);
    expect(stages.at(-1)).toBe("walk_completed");
  });

  it("fails with RepositoryNotFoundError for an unknown path", () => {
    expect(() => getLineHistoryFromGit("/work/other", query, undefined, undefined, factory)).toThrow(
      RepositoryNotFoundError,
    );
  });
});
