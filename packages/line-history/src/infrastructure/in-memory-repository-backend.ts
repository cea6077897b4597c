import {
  BackendIoError,
  RepositoryEmptyError,
  RepositoryNotFoundError,
  type GitCommit,
} from "@lineage/core";
import type { RepositoryBackend, RepositoryBackendFactory } from "../application/repository-backend.js";

export type InMemoryCommit = {
  hash: string;
  authorName: string;
  authoredAtUnix: number;
  message?: string;
  parentHashes: readonly string[];
  // full tree at this commit: path -> content
  files: Readonly<Record<string, string>>;
};

const toGitCommit = (commit: InMemoryCommit): GitCommit => ({
  hash: commit.hash,
  authorName: commit.authorName,
  authoredAtUnix: commit.authoredAtUnix,
  message: commit.message ?? "",
  parentHashes: [...commit.parentHashes],
});

/**
 * Repository backend over a hand-built commit graph. HEAD is the last commit given unless
 * `headHash` says otherwise.
 */
export class InMemoryRepositoryBackend implements RepositoryBackend {
  private readonly commitsByHash: ReadonlyMap<string, InMemoryCommit>;
  private readonly headHash: string | undefined;

  constructor(commits: readonly InMemoryCommit[], headHash?: string) {
    this.commitsByHash = new Map(commits.map((commit) => [commit.hash, commit]));
    this.headHash = headHash ?? commits[commits.length - 1]?.hash;
  }

  headCommit(): GitCommit {
    if (this.headHash === undefined) {
      throw new RepositoryEmptyError();
    }

    return toGitCommit(this.lookup(this.headHash));
  }

  *walkCommits(from?: GitCommit, limit?: number): Generator<GitCommit, void, undefined> {
    const start = from ?? this.headCommit();
    const visited = new Set<string>();
    const reachable: InMemoryCommit[] = [];
    const pending = [start.hash];

    while (pending.length > 0) {
      const hash = pending.shift();
      if (hash === undefined || visited.has(hash)) {
        continue;
      }

      visited.add(hash);
      const commit = this.lookup(hash);
      reachable.push(commit);
      pending.push(...commit.parentHashes);
    }

    reachable.sort((left, right) => right.authoredAtUnix - left.authoredAtUnix);
    for (const commit of reachable.slice(0, limit)) {
      yield toGitCommit(commit);
    }
  }

  pathExistsInTree(commit: GitCommit, path: string): boolean {
    return Object.hasOwn(this.lookup(commit.hash).files, path);
  }

  changedPaths(commit: GitCommit): ReadonlySet<string> {
    const current = this.lookup(commit.hash).files;
    if (commit.parentHashes.length === 0) {
      return new Set(Object.keys(current));
    }

    const changed = new Set<string>();
    for (const parentHash of commit.parentHashes) {
      const parent = this.lookup(parentHash).files;
      for (const path of new Set([...Object.keys(parent), ...Object.keys(current)])) {
        if (parent[path] !== current[path]) {
          changed.add(path);
        }
      }
    }

    return changed;
  }

  private lookup(hash: string): InMemoryCommit {
    const commit = this.commitsByHash.get(hash);
    if (commit === undefined) {
      throw new BackendIoError(`Unknown commit ${hash}`);
    }

    return commit;
  }
}

export class InMemoryRepositoryBackendFactory implements RepositoryBackendFactory {
  constructor(private readonly repositories: Readonly<Record<string, RepositoryBackend>>) {}

  open(repositoryPath: string): RepositoryBackend {
    const backend = this.repositories[repositoryPath];
    if (backend === undefined) {
      throw new RepositoryNotFoundError(repositoryPath);
    }

    return backend;
  }
}
