import {
  BackendIoError,
  RepositoryEmptyError,
  RepositoryNotFoundError,
  type GitCommit,
} from "@lineage/core";
import type { RepositoryBackend, RepositoryBackendFactory } from "../application/repository-backend.js";
import { GIT_LOG_FORMAT } from "../domain/git-log-format.js";
import { parseGitLog, parseNulSeparatedPaths } from "../parsing/git-log-parser.js";
import {
  buildLogPageArgs,
  ExecGitCommandClient,
  GitCommandError,
  type GitCommandClient,
  type GitLogPageRequest,
} from "./git-command-client.js";

export const LOG_PAGE_SIZE = 256;

const NOT_A_REPOSITORY_MARKERS = ["not a git repository", "cannot change to"];

const isNotRepositoryError = (error: GitCommandError): boolean => {
  const lower = error.message.toLowerCase();
  return NOT_A_REPOSITORY_MARKERS.some((marker) => lower.includes(marker));
};

const toBackendIoError = (error: unknown, args: readonly string[]): BackendIoError => {
  const reason = error instanceof Error ? error.message : String(error);
  return new BackendIoError(`git ${args.join(" ")} failed: ${reason}`, { cause: error });
};

export class GitCliRepositoryBackend implements RepositoryBackend {
  constructor(
    private readonly gitClient: GitCommandClient,
    private readonly repositoryPath: string,
    private readonly logPageSize: number = LOG_PAGE_SIZE,
  ) {}

  headCommit(): GitCommit {
    let headHash: string;
    try {
      headHash = this.gitClient
        .run(this.repositoryPath, ["rev-parse", "--verify", "--quiet", "HEAD^{commit}"])
        .trim();
    } catch (error) {
      if (error instanceof GitCommandError) {
        throw new RepositoryEmptyError({ cause: error });
      }

      throw error;
    }

    if (headHash.length === 0) {
      throw new RepositoryEmptyError();
    }

    const [head] = parseGitLog(this.readLogPage({ revision: headHash, skip: 0, maxCount: 1 }));
    if (head === undefined) {
      throw new BackendIoError(`Unable to read HEAD commit ${headHash}`);
    }

    return head;
  }

  // Pages through `git log` so a walk stopped early never makes git print the rest of history.
  *walkCommits(from?: GitCommit, limit?: number): Generator<GitCommit, void, undefined> {
    const start = from ?? this.headCommit();
    const seen = new Set<string>();
    let skip = 0;

    while (limit === undefined || seen.size < limit) {
      const maxCount =
        limit === undefined ? this.logPageSize : Math.min(this.logPageSize, limit - seen.size);
      const page = [...parseGitLog(this.readLogPage({ revision: start.hash, skip, maxCount }))];

      for (const commit of page) {
        if (seen.has(commit.hash)) {
          continue;
        }

        seen.add(commit.hash);
        yield commit;
      }

      if (page.length < maxCount) {
        return;
      }

      skip += page.length;
    }
  }

  pathExistsInTree(commit: GitCommit, path: string): boolean {
    const output = this.run([
      "--literal-pathspecs",
      "ls-tree",
      "-z",
      "--full-tree",
      "--name-only",
      commit.hash,
      "--",
      path,
    ]);
    return parseNulSeparatedPaths(output).includes(path);
  }

  changedPaths(commit: GitCommit): ReadonlySet<string> {
    if (commit.parentHashes.length === 0) {
      return new Set(
        parseNulSeparatedPaths(
          this.run(["ls-tree", "-r", "-z", "--full-tree", "--name-only", commit.hash]),
        ),
      );
    }

    const changed = new Set<string>();
    for (const parentHash of commit.parentHashes) {
      const output = this.run([
        "diff-tree",
        "-r",
        "-z",
        "--no-renames",
        "--name-only",
        parentHash,
        commit.hash,
      ]);
      for (const path of parseNulSeparatedPaths(output)) {
        changed.add(path);
      }
    }

    return changed;
  }

  private readLogPage(request: Omit<GitLogPageRequest, "format">): string {
    const fullRequest: GitLogPageRequest = { ...request, format: GIT_LOG_FORMAT };
    try {
      return this.gitClient.readLogPage(this.repositoryPath, fullRequest);
    } catch (error) {
      throw toBackendIoError(error, buildLogPageArgs(fullRequest));
    }
  }

  private run(args: readonly string[]): string {
    try {
      return this.gitClient.run(this.repositoryPath, args);
    } catch (error) {
      throw toBackendIoError(error, args);
    }
  }
}

export class GitCliRepositoryBackendFactory implements RepositoryBackendFactory {
  constructor(private readonly gitClient: GitCommandClient = new ExecGitCommandClient()) {}

  open(repositoryPath: string): RepositoryBackend {
    const args = ["rev-parse", "--git-dir"];
    try {
      this.gitClient.run(repositoryPath, args);
    } catch (error) {
      if (error instanceof GitCommandError && isNotRepositoryError(error)) {
        throw new RepositoryNotFoundError(repositoryPath, { cause: error });
      }

      throw toBackendIoError(error, args);
    }

    return new GitCliRepositoryBackend(this.gitClient, repositoryPath);
  }
}
