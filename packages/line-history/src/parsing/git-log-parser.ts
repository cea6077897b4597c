import type { GitCommit } from "@lineage/core";
import { COMMIT_FIELD_SEPARATOR, COMMIT_RECORD_SEPARATOR } from "../domain/git-log-format.js";

const HEADER_FIELD_COUNT = 4;

const parseInteger = (value: string): number | null => {
  if (value.length === 0) {
    return null;
  }

  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    return null;
  }

  return parsed;
};

const parseParentHashes = (value: string): readonly string[] =>
  value
    .trim()
    .split(/\s+/)
    .filter((hash) => hash.length > 0);

export const parseGitLogRecord = (record: string): GitCommit | null => {
  const fields = record.replace(/^\n+/, "").split(COMMIT_FIELD_SEPARATOR);
  if (fields.length <= HEADER_FIELD_COUNT) {
    return null;
  }

  const [hash, parentsRaw, authorName, authoredAtRaw] = fields;
  if (hash === undefined || parentsRaw === undefined || authorName === undefined || authoredAtRaw === undefined) {
    return null;
  }

  const authoredAtUnix = parseInteger(authoredAtRaw.trim());
  if (hash.trim().length === 0 || authoredAtUnix === null) {
    return null;
  }

  return {
    hash: hash.trim(),
    authorName: authorName.length > 0 ? authorName : "Unknown",
    authoredAtUnix,
    message: fields.slice(HEADER_FIELD_COUNT).join(COMMIT_FIELD_SEPARATOR).trimEnd(),
    parentHashes: parseParentHashes(parentsRaw),
  };
};

/**
 * Yields commits in the order git printed them. Records are parsed on demand, so a consumer that
 * stops early never parses the rest of the log.
 */
export function* parseGitLog(rawLog: string): Generator<GitCommit, void, undefined> {
  let cursor = rawLog.indexOf(COMMIT_RECORD_SEPARATOR);
  while (cursor !== -1) {
    const next = rawLog.indexOf(COMMIT_RECORD_SEPARATOR, cursor + 1);
    const record = rawLog.slice(cursor + 1, next === -1 ? undefined : next);
    const commit = parseGitLogRecord(record);
    if (commit !== null) {
      yield commit;
    }

    cursor = next;
  }
}

export const parseNulSeparatedPaths = (output: string): readonly string[] =>
  output.split("\u0000").filter((path) => path.length > 0);
