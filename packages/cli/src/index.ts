import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { SortOrder } from "@lineage/core";
import { OUTPUT_FORMATS, type OutputFormat } from "@lineage/reporter";
import {
  collectValues,
  parseCommitLimit,
  parseLineNumber,
  resolveSortOrder,
} from "./application/cli-options.js";
import { createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import { runHistoryCommand } from "./application/run-history-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const readPackageVersion = (path: string): string => {
  const manifest: unknown = JSON.parse(readFileSync(path, "utf8"));
  if (typeof manifest === "object" && manifest !== null && "version" in manifest) {
    const { version } = manifest;
    if (typeof version === "string") {
      return version;
    }
  }
  return "0.0.0";
};
const version = readPackageVersion(packageJsonPath);

program
  .name("lineage")
  .description("Trace the complete commit history of a single line in a git repository")
  .version(version)
  .argument("<file>", "repository-relative path of the file to trace")
  .argument("<line>", "line number to trace (1-based)", parseLineNumber)
  .addOption(
    new Option("-f, --format <format>", "output format")
      .choices([...OUTPUT_FORMATS])
      .default("colored"),
  )
  .addOption(
    new Option("-s, --sort <order>", "sort order: asc (oldest first) or desc (newest first)")
      .choices(["asc", "desc"])
      .default("asc"),
  )
  .option("-r, --reverse", "shortcut for --sort desc")
  .option(
    "--ignore-rev <rev>",
    "ignore a commit by full or abbreviated hash (repeatable)",
    collectValues,
    [],
  )
  .option("--since <date>", "only include commits authored at or after this date")
  .option("--until <date>", "only include commits authored at or before this date")
  .option("-l, --limit <count>", "maximum number of commits to traverse", parseCommitLimit)
  .option("-C, --repo <path>", "path to the git repository (defaults to the current directory)")
  .option("--no-color", "disable colored output")
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(["silent", "error", "warn", "info", "debug"])
      .default(parseLogLevel(process.env["LINEAGE_LOG_LEVEL"])),
  )
  .action(
    (
      file: string,
      line: number,
      options: {
        format: OutputFormat;
        sort: SortOrder;
        reverse?: boolean;
        ignoreRev: string[];
        since?: string;
        until?: string;
        limit?: number;
        repo?: string;
        color: boolean;
        logLevel: LogLevel;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      try {
        const { rendered } = runHistoryCommand(
          file,
          line,
          {
            format: options.format,
            sortOrder: resolveSortOrder(options.sort, options.reverse),
            ignoreRevs: options.ignoreRev,
            color: options.color && process.stdout.isTTY === true,
            ...(options.repo === undefined ? {} : { repositoryPath: options.repo }),
            ...(options.since === undefined ? {} : { since: options.since }),
            ...(options.until === undefined ? {} : { until: options.until }),
            ...(options.limit === undefined ? {} : { maxCommits: options.limit }),
          },
          logger,
        );
        process.stdout.write(`${rendered}\n`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        if (error instanceof Error && error.stack !== undefined) {
          logger.debug(error.stack);
        }

        process.stderr.write(`error: ${message}\n`);
        process.exitCode = 1;
      }
    },
  );

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

if (argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

await program.parseAsync(argv);
