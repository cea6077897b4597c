import { resolve } from "node:path";
import { shortenHash, type LineHistory, type SortOrder } from "@lineage/core";
import {
  extractLineHistory,
  GitCliRepositoryBackendFactory,
  type LineHistoryProgressEvent,
  type LineHistoryQuery,
  type RepositoryBackendFactory,
} from "@lineage/line-history";
import { formatLineHistory, type OutputFormat } from "@lineage/reporter";
import { createSilentLogger, type Logger } from "./logger.js";

export type HistoryCommandOptions = {
  repositoryPath?: string;
  format: OutputFormat;
  sortOrder: SortOrder;
  ignoreRevs: readonly string[];
  since?: string;
  until?: string;
  maxCommits?: number;
  color: boolean;
};

export type HistoryCommandResult = {
  history: LineHistory;
  rendered: string;
};

const resolveRepositoryPath = (inputPath: string | undefined, cwd: string): string =>
  resolve(cwd, inputPath ?? ".");

const createHistoryProgressReporter = (
  logger: Logger,
): ((event: LineHistoryProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "resolving_head":
        logger.debug("history: resolving HEAD");
        break;
      case "walk_started":
        logger.info(`history: walking commits from ${shortenHash(event.headHash)}`);
        break;
      case "commit_ignored":
        logger.debug(`history: ignoring ${event.hash}`);
        break;
      case "commit_out_of_range":
        logger.debug(`history: ${event.hash} outside date range`);
        break;
      case "commit_relevant":
        logger.debug(`history: ${event.hash} touches the file`);
        break;
      case "traversal_limit_reached":
        logger.warn(`history: stopped after ${event.maxCommits} commits (--limit)`);
        break;
      case "walk_completed":
        logger.info(
          `history: walked ${event.walkedCommits} commits, ${event.relevantCommits} relevant`,
        );
        break;
    }
  };
};

export const runHistoryCommand = (
  filePath: string,
  lineNumber: number,
  options: HistoryCommandOptions,
  logger: Logger = createSilentLogger(),
  backendFactory: RepositoryBackendFactory = new GitCliRepositoryBackendFactory(),
  cwd: string = process.cwd(),
): HistoryCommandResult => {
  const repositoryPath = resolveRepositoryPath(options.repositoryPath, cwd);
  logger.info(`opening repository: ${repositoryPath}`);
  const backend = backendFactory.open(repositoryPath);

  const query: LineHistoryQuery = {
    filePath,
    lineNumber,
    sortOrder: options.sortOrder,
    ignoreRevs: options.ignoreRevs,
    ...(options.since === undefined ? {} : { since: options.since }),
    ...(options.until === undefined ? {} : { until: options.until }),
    ...(options.maxCommits === undefined ? {} : { maxCommits: options.maxCommits }),
  };

  const history = extractLineHistory(query, backend, undefined, createHistoryProgressReporter(logger));
  logger.debug(`rendering ${history.events.length} events as ${options.format}`);

  return {
    history,
    rendered: formatLineHistory(history, options.format, { color: options.color }),
  };
};
