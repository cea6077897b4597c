import type { GitCommit } from "@lineage/core";

/**
 * Read-only view of a commit graph. The engine only talks to this interface, so any version
 * control system that can answer these five questions can be plugged in.
 */
export interface RepositoryBackend {
  /** @throws RepositoryEmptyError when HEAD resolves to no commit. */
  headCommit(): GitCommit;
  /**
   * Commits reachable from `from` (HEAD by default), newest commit time first. Each commit is
   * yielded once even when several ancestry paths lead to it. With `limit`, at most that many
   * commits are read from the repository.
   */
  walkCommits(from?: GitCommit, limit?: number): Iterable<GitCommit>;
  pathExistsInTree(commit: GitCommit, path: string): boolean;
  /** Union of paths changed against each parent; every tree path for a root commit. */
  changedPaths(commit: GitCommit): ReadonlySet<string>;
}

export interface RepositoryBackendFactory {
  /** @throws RepositoryNotFoundError when the path is not inside a repository. */
  open(repositoryPath: string): RepositoryBackend;
}
