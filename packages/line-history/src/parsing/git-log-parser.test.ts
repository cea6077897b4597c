import { describe, expect, it } from "vitest";
import { parseGitLog, parseGitLogRecord, parseNulSeparatedPaths } from "./git-log-parser.js";

describe("parseGitLog", () => {
  it("parses hashes, parents, authors and multi-line messages", () => {
    const raw = [
      "\u001ec3\u001fc2 b7\u001fAlice\u001f1700003600\u001fMerge branch 'topic'\n\nDetails here\n",
      "\n\u001ec2\u001fc1\u001fBob\u001f1700000000\u001fFix typo\n",
      "\n\u001ec1\u001f\u001fCarol\u001f1690000000\u001fInitial commit\n",
    ].join("");

    const commits = [...parseGitLog(raw)];

    expect(commits).toEqual([
      {
        hash: "c3",
        authorName: "Alice",
        authoredAtUnix: 1700003600,
        message: "Merge branch 'topic'\n\nDetails here",
        parentHashes: ["c2", "b7"],
      },
      {
        hash: "c2",
        authorName: "Bob",
        authoredAtUnix: 1700000000,
        message: "Fix typo",
        parentHashes: ["c1"],
      },
      {
        hash: "c1",
        authorName: "Carol",
        authoredAtUnix: 1690000000,
        message: "Initial commit",
        parentHashes: [],
      },
    ]);
  });

  it("skips malformed records", () => {
    const raw = "\u001ebroken\u001f\u001e\u001ec1\u001f\u001fAlice\u001fnot-a-time\u001fmsg\n\u001ec2\u001f\u001fBob\u001f5\u001fok\n";

    expect([...parseGitLog(raw)].map((commit) => commit.hash)).toEqual(["c2"]);
  });

  it("parses records lazily", () => {
    const iterator = parseGitLog("\u001ea\u001f\u001fA\u001f1\u001fone\n\u001eb\u001f\u001fB\u001f2\u001ftwo\n");

    expect(iterator.next().value).toMatchObject({ hash: "a" });
    expect(iterator.next().value).toMatchObject({ hash: "b" });
    expect(iterator.next().done).toBe(true);
  });

  it("keeps field separators that appear inside the message body", () => {
    const commit = parseGitLogRecord("a\u001f\u001fA\u001f1\u001fsubject\u001fmore\n");

    expect(commit?.message).toBe("subject\u001fmore");
  });

  it("falls back to Unknown for an empty author name", () => {
    expect(parseGitLogRecord("a\u001f\u001f\u001f1\u001fmsg")?.authorName).toBe("Unknown");
  });
});

describe("parseNulSeparatedPaths", () => {
  it("splits -z output and drops the trailing terminator", () => {
    expect(parseNulSeparatedPaths("src/a.ts\u0000docs/read me.md\u0000")).toEqual([
      "src/a.ts",
      "docs/read me.md",
    ]);
    expect(parseNulSeparatedPaths("")).toEqual([]);
  });
});
