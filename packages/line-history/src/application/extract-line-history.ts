import {
  createLineHistory,
  FileNotFoundError,
  InvalidLineNumberError,
  normalizeRepositoryPath,
  type GitCommit,
  type LineEvent,
  type LineHistory,
} from "@lineage/core";
import {
  isIgnoredCommit,
  isWithinDateWindow,
  normalizeIgnoreRevs,
  type DateWindow,
} from "../domain/commit-filters.js";
import { parseDate } from "../domain/date-parser.js";
import {
  DEFAULT_LINE_HISTORY_CONFIG,
  type LineHistoryConfig,
  type LineHistoryQuery,
} from "../domain/line-history-config.js";
import type { RepositoryBackend } from "./repository-backend.js";

export type LineHistoryProgressEvent =
  | { stage: "resolving_head" }
  | { stage: "walk_started"; headHash: string }
  | { stage: "commit_ignored"; hash: string }
  | { stage: "commit_out_of_range"; hash: string }
  | { stage: "commit_relevant"; hash: string }
  | { stage: "traversal_limit_reached"; maxCommits: number }
  | { stage: "walk_completed"; walkedCommits: number; relevantCommits: number };

type RelevantCommit = {
  commit: GitCommit;
  traversalIndex: number;
};

const createEffectiveConfig = (
  overrides: Partial<LineHistoryConfig> | undefined,
  query: LineHistoryQuery,
): LineHistoryConfig => ({
  ...DEFAULT_LINE_HISTORY_CONFIG,
  ...overrides,
  ...(query.maxCommits === undefined ? {} : { maxCommits: query.maxCommits }),
});

const resolveDateWindow = (query: LineHistoryQuery): DateWindow => ({
  sinceMillis: query.since === undefined ? null : parseDate(query.since).getTime(),
  untilMillis: query.until === undefined ? null : parseDate(query.until).getTime(),
});

// Older first; on equal timestamps the commit reached later in the walk counts as older.
const compareOldestFirst = (left: RelevantCommit, right: RelevantCommit): number =>
  left.commit.authoredAtUnix - right.commit.authoredAtUnix || right.traversalIndex - left.traversalIndex;

const isRelevantCommit = (backend: RepositoryBackend, commit: GitCommit, filePath: string): boolean => {
  if (!backend.pathExistsInTree(commit, filePath)) {
    return false;
  }

  // File level approximation: any commit touching the file counts, whether or not the target line changed.
  return commit.parentHashes.length === 0 || backend.changedPaths(commit).has(filePath);
};

const toLineEvent = (commit: GitCommit, changeType: LineEvent["changeType"]): LineEvent => ({
  commitHash: commit.hash,
  author: commit.authorName,
  authoredAtUnix: commit.authoredAtUnix,
  message: commit.message,
  changeType,
  content: "",
});

/**
 * Walks the history reachable from HEAD and returns every commit that touched `query.filePath`,
 * after the ignore and date filters. The oldest surviving commit is tagged `Created`, the rest
 * `Modified`, regardless of the requested sort order.
 */
export const extractLineHistory = (
  query: LineHistoryQuery,
  backend: RepositoryBackend,
  config?: Partial<LineHistoryConfig>,
  onProgress?: (event: LineHistoryProgressEvent) => void,
): LineHistory => {
  if (!Number.isInteger(query.lineNumber) || query.lineNumber < 1) {
    throw new InvalidLineNumberError(query.lineNumber);
  }

  const filePath = normalizeRepositoryPath(query.filePath);
  const ignoreRevs = normalizeIgnoreRevs(query.ignoreRevs);
  const dateWindow = resolveDateWindow(query);
  const { maxCommits } = createEffectiveConfig(config, query);

  onProgress?.({ stage: "resolving_head" });
  const head = backend.headCommit();
  onProgress?.({ stage: "walk_started", headHash: head.hash });

  const seen = new Set<string>();
  const relevant: RelevantCommit[] = [];

  if (maxCommits === null || maxCommits > 0) {
    for (const commit of backend.walkCommits(head, maxCommits ?? undefined)) {
      if (seen.has(commit.hash)) {
        continue;
      }

      seen.add(commit.hash);
      const traversalIndex = seen.size - 1;

      if (isIgnoredCommit(commit, ignoreRevs)) {
        onProgress?.({ stage: "commit_ignored", hash: commit.hash });
      } else if (!isWithinDateWindow(commit, dateWindow)) {
        onProgress?.({ stage: "commit_out_of_range", hash: commit.hash });
      } else if (isRelevantCommit(backend, commit, filePath)) {
        relevant.push({ commit, traversalIndex });
        onProgress?.({ stage: "commit_relevant", hash: commit.hash });
      }

      if (maxCommits !== null && seen.size >= maxCommits) {
        onProgress?.({ stage: "traversal_limit_reached", maxCommits });
        break;
      }
    }
  }

  onProgress?.({ stage: "walk_completed", walkedCommits: seen.size, relevantCommits: relevant.length });

  if (relevant.length === 0 && !backend.pathExistsInTree(head, filePath)) {
    throw new FileNotFoundError(filePath);
  }

  const oldestFirst = [...relevant].sort(compareOldestFirst);
  const events = oldestFirst.map(({ commit }, index) =>
    toLineEvent(commit, index === 0 ? "Created" : "Modified"),
  );

  return createLineHistory(filePath, query.lineNumber, query.sortOrder === "desc" ? events.reverse() : events);
};
