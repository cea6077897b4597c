import type { GitCommit } from "@lineage/core";

export type DateWindow = {
  sinceMillis: number | null;
  untilMillis: number | null;
};

export const normalizeIgnoreRevs = (ignoreRevs: readonly string[]): readonly string[] =>
  ignoreRevs.map((rev) => rev.trim().toLowerCase()).filter((rev) => rev.length > 0);

/** Matches full hashes as well as abbreviated ones. Expects revs from {@link normalizeIgnoreRevs}. */
export const isIgnoredCommit = (commit: GitCommit, ignoreRevs: readonly string[]): boolean => {
  const hash = commit.hash.toLowerCase();
  return ignoreRevs.some((rev) => hash === rev || hash.startsWith(rev));
};

export const isWithinDateWindow = (commit: GitCommit, window: DateWindow): boolean => {
  const authoredAtMillis = commit.authoredAtUnix * 1000;
  if (window.sinceMillis !== null && authoredAtMillis < window.sinceMillis) {
    return false;
  }

  if (window.untilMillis !== null && authoredAtMillis > window.untilMillis) {
    return false;
  }

  return true;
};
