import type { LineHistory } from "@lineage/core";
import {
  extractLineHistory,
  type LineHistoryProgressEvent,
} from "./application/extract-line-history.js";
import type { RepositoryBackendFactory } from "./application/repository-backend.js";
import type { LineHistoryConfig, LineHistoryQuery } from "./domain/line-history-config.js";
import { GitCliRepositoryBackendFactory } from "./infrastructure/git-cli-repository-backend.js";

export { extractLineHistory, type LineHistoryProgressEvent };
export type { RepositoryBackend, RepositoryBackendFactory } from "./application/repository-backend.js";
export {
  DEFAULT_LINE_HISTORY_CONFIG,
  type LineHistoryConfig,
  type LineHistoryQuery,
} from "./domain/line-history-config.js";
export { parseDate, SUPPORTED_DATE_FORMATS } from "./domain/date-parser.js";
export {
  ExecGitCommandClient,
  GitCommandError,
  type GitCommandClient,
  type GitLogPageRequest,
} from "./infrastructure/git-command-client.js";
export {
  GitCliRepositoryBackend,
  GitCliRepositoryBackendFactory,
  LOG_PAGE_SIZE,
} from "./infrastructure/git-cli-repository-backend.js";
export {
  InMemoryRepositoryBackend,
  InMemoryRepositoryBackendFactory,
  type InMemoryCommit,
} from "./infrastructure/in-memory-repository-backend.js";

/** Opens `repositoryPath` (through the git CLI unless another factory is given) and extracts the history. */
export const getLineHistoryFromGit = (
  repositoryPath: string,
  query: LineHistoryQuery,
  config?: Partial<LineHistoryConfig>,
  onProgress?: (event: LineHistoryProgressEvent) => void,
  backendFactory: RepositoryBackendFactory = new GitCliRepositoryBackendFactory(),
): LineHistory => extractLineHistory(query, backendFactory.open(repositoryPath), config, onProgress);
