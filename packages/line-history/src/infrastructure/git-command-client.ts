import { execFileSync } from "node:child_process";

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number | null;

  constructor(
    message: string,
    args: readonly string[],
    options?: { cause?: unknown; exitCode?: number | null },
  ) {
    super(message, options);
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = options?.exitCode ?? null;
  }
}

/** One page of `git log --date-order` output, newest commit time first. */
export type GitLogPageRequest = {
  revision: string;
  format: string;
  skip: number;
  maxCount: number;
};

export interface GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string;
  readLogPage(repositoryPath: string, request: GitLogPageRequest): string;
}

export const buildLogPageArgs = (request: GitLogPageRequest): string[] => [
  "log",
  "--date-order",
  "--no-show-signature",
  `--format=${request.format}`,
  `--skip=${request.skip}`,
  `--max-count=${request.maxCount}`,
  request.revision,
];

/** Prefers git's own stderr over the wrapper text `execFileSync` puts in `message`. */
export const describeGitFailure = (error: unknown): { message: string; exitCode: number | null } => {
  if (!(error instanceof Error)) {
    return { message: "Unknown git execution error", exitCode: null };
  }

  const stderr = "stderr" in error && typeof error.stderr === "string" ? error.stderr.trim() : "";
  const exitCode = "status" in error && typeof error.status === "number" ? error.status : null;
  return { message: stderr.length > 0 ? stderr : error.message, exitCode };
};

const MAX_OUTPUT_BYTES = 1024 * 1024 * 64;

export class ExecGitCommandClient implements GitCommandClient {
  run(repositoryPath: string, args: readonly string[]): string {
    try {
      return execFileSync("git", ["-C", repositoryPath, ...args], {
        encoding: "utf8",
        maxBuffer: MAX_OUTPUT_BYTES,
        stdio: ["ignore", "pipe", "pipe"],
      });
    } catch (error) {
      const { message, exitCode } = describeGitFailure(error);
      throw new GitCommandError(message, args, { cause: error, exitCode });
    }
  }

  readLogPage(repositoryPath: string, request: GitLogPageRequest): string {
    return this.run(repositoryPath, buildLogPageArgs(request));
  }
}
