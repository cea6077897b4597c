import type { LineHistory } from "@lineage/core";

export type OutputFormat = "colored" | "json" | "yaml" | "table";

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["colored", "json", "yaml", "table"];

export type LineHistoryRenderer = {
  render: (history: LineHistory) => string;
};

export type RendererOptions = {
  // Colour for the colored format. Passed per renderer so tests can pin plain output.
  color: boolean;
};

export type SerializedLineEntry = {
  commitHash: string;
  shortHash: string;
  author: string;
  timestamp: string;
  changeType: string;
  message: string;
  content?: string;
};

export type SerializedLineHistory = {
  filePath: string;
  lineNumber: number;
  entries: SerializedLineEntry[];
};

export const JSON_FALLBACK_OUTPUT = "{}";
export const YAML_FALLBACK_OUTPUT = "Error formatting YAML";
export const TEXT_FALLBACK_OUTPUT = "Error formatting line history";
