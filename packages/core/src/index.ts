import { sep } from "node:path";

export {
  BackendIoError,
  FileNotFoundError,
  InvalidDateFormatError,
  InvalidLineNumberError,
  LineHistoryError,
  RepositoryEmptyError,
  RepositoryNotFoundError,
  type LineHistoryErrorCode,
} from "./errors.js";

export type GitCommit = {
  hash: string;
  authorName: string;
  authoredAtUnix: number;
  message: string;
  parentHashes: readonly string[];
};

export type ChangeType = "Created" | "Modified" | "Deleted";

export type SortOrder = "asc" | "desc";

export type LineEvent = {
  readonly commitHash: string;
  readonly author: string;
  readonly authoredAtUnix: number;
  readonly message: string;
  readonly changeType: ChangeType;
  readonly content: string;
};

export type LineHistory = {
  readonly filePath: string;
  readonly lineNumber: number;
  readonly events: readonly LineEvent[];
};

export const SHORT_HASH_LENGTH = 8;

export const shortenHash = (hash: string): string => hash.slice(0, SHORT_HASH_LENGTH);

/**
 * Builds the immutable aggregate. Events are copied and frozen so one history can be handed to
 * several renderers.
 */
export const createLineHistory = (
  filePath: string,
  lineNumber: number,
  events: readonly LineEvent[],
): LineHistory =>
  Object.freeze({
    filePath,
    lineNumber,
    events: Object.freeze(events.map((event) => Object.freeze({ ...event }))),
  });

/** Repository-relative form of a user-supplied path. Backslashes are separators only on Windows. */
export const normalizeRepositoryPath = (inputPath: string, separator: string = sep): string => {
  const slashed = separator === "\\" ? inputPath.replace(/\\/g, "/") : inputPath;
  let normalized = slashed.replace(/\/{2,}/g, "/");
  while (normalized.startsWith("./")) {
    normalized = normalized.slice(2);
  }

  return normalized;
};

const pad = (value: number): string => value.toString().padStart(2, "0");

export const formatUtcTimestamp = (authoredAtUnix: number): string => {
  const date = new Date(authoredAtUnix * 1000);
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
};
