import type { SortOrder } from "@lineage/core";

export type LineHistoryConfig = {
  // Upper bound on commits pulled from the walk, counted before any filter. null walks everything.
  maxCommits: number | null;
};

export const DEFAULT_LINE_HISTORY_CONFIG: LineHistoryConfig = {
  maxCommits: null,
};

export type LineHistoryQuery = {
  filePath: string;
  lineNumber: number;
  sortOrder: SortOrder;
  ignoreRevs: readonly string[];
  since?: string;
  until?: string;
  maxCommits?: number;
};
