import { Chalk } from "chalk";
import { dump } from "js-yaml";
import { formatUtcTimestamp, shortenHash, type LineEvent, type LineHistory } from "@lineage/core";
import { renderSafely, toSerializedLineHistory } from "./document.js";
import {
  JSON_FALLBACK_OUTPUT,
  TEXT_FALLBACK_OUTPUT,
  YAML_FALLBACK_OUTPUT,
  type LineHistoryRenderer,
  type RendererOptions,
} from "./domain.js";

export const createColoredRenderer = (options: RendererOptions): LineHistoryRenderer => {
  const chalk = new Chalk({ level: options.color ? 1 : 0 });

  const renderEvent = (event: LineEvent): string[] => {
    const lines = [
      [
        chalk.greenBright(shortenHash(event.commitHash)),
        chalk.blue(event.author),
        chalk.white(formatUtcTimestamp(event.authoredAtUnix)),
        chalk.magenta(`(${event.changeType})`),
      ].join(" "),
      chalk.white(event.message),
    ];
    if (event.content.length > 0) {
      lines.push(`  ${chalk.whiteBright(event.content)}`);
    }

    return lines;
  };

  return {
    render: (history) =>
      renderSafely(() => {
        const lines = [`${chalk.cyan(history.filePath)}:${chalk.yellow(String(history.lineNumber))}`];
        if (history.events.length === 0) {
          lines.push(chalk.dim("No history found"));
          return lines.join("\n");
        }

        history.events.forEach((event, index) => {
          if (index > 0) {
            lines.push("");
          }

          lines.push(...renderEvent(event));
        });

        return lines.join("\n");
      }, TEXT_FALLBACK_OUTPUT),
  };
};

export const createJsonRenderer = (): LineHistoryRenderer => ({
  render: (history) =>
    renderSafely(() => JSON.stringify(toSerializedLineHistory(history), null, 2), JSON_FALLBACK_OUTPUT),
});

export const createYamlRenderer = (): LineHistoryRenderer => ({
  render: (history) =>
    renderSafely(
      () => dump(toSerializedLineHistory(history), { lineWidth: -1, noRefs: true }),
      YAML_FALLBACK_OUTPUT,
    ),
});

type TableColumn = {
  header: string;
  cell: (event: LineEvent) => string;
};

const singleLine = (value: string): string => value.replace(/[\t\r\n]+/g, " ").trim();

const subjectLine = (message: string): string => singleLine(message.split("\n")[0] ?? "");

const TABLE_COLUMNS: readonly TableColumn[] = [
  { header: "Commit", cell: (event) => shortenHash(event.commitHash) },
  { header: "Author", cell: (event) => singleLine(event.author) },
  { header: "Timestamp", cell: (event) => formatUtcTimestamp(event.authoredAtUnix) },
  { header: "Change Type", cell: (event) => event.changeType },
  { header: "Message", cell: (event) => subjectLine(event.message) },
];

const CONTENT_COLUMN: TableColumn = { header: "Content", cell: (event) => singleLine(event.content) };

const renderTable = (events: readonly LineEvent[]): string => {
  const columns = events.some((event) => event.content.length > 0)
    ? [...TABLE_COLUMNS, CONTENT_COLUMN]
    : TABLE_COLUMNS;
  const rows = events.map((event) => columns.map((column) => column.cell(event)));
  const widths = columns.map((column, index) =>
    Math.max(column.header.length, ...rows.map((row) => (row[index] ?? "").length)),
  );

  const border = `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;
  const formatRow = (cells: readonly string[]): string =>
    `| ${cells.map((cell, index) => cell.padEnd(widths[index] ?? 0)).join(" | ")} |`;

  return [
    border,
    formatRow(columns.map((column) => column.header)),
    border,
    ...rows.map(formatRow),
    border,
  ].join("\n");
};

export const createTableRenderer = (): LineHistoryRenderer => ({
  render: (history: LineHistory) =>
    renderSafely(() => {
      const header = `File: ${history.filePath}\nLine: ${history.lineNumber}\n\n`;
      if (history.events.length === 0) {
        return `${header}No history entries`;
      }

      return `${header}${renderTable(history.events)}`;
    }, TEXT_FALLBACK_OUTPUT),
});
