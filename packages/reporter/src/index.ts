import type { LineHistory } from "@lineage/core";
import type { LineHistoryRenderer, OutputFormat, RendererOptions } from "./domain.js";
import {
  createColoredRenderer,
  createJsonRenderer,
  createTableRenderer,
  createYamlRenderer,
} from "./renderers.js";

export {
  OUTPUT_FORMATS,
  type LineHistoryRenderer,
  type OutputFormat,
  type RendererOptions,
  type SerializedLineEntry,
  type SerializedLineHistory,
} from "./domain.js";
export { toSerializedLineHistory } from "./document.js";
export { createColoredRenderer, createJsonRenderer, createTableRenderer, createYamlRenderer };

export const createRenderer = (format: OutputFormat, options: RendererOptions): LineHistoryRenderer => {
  switch (format) {
    case "json":
      return createJsonRenderer();
    case "yaml":
      return createYamlRenderer();
    case "table":
      return createTableRenderer();
    case "colored":
      return createColoredRenderer(options);
  }
};

export const formatLineHistory = (
  history: LineHistory,
  format: OutputFormat,
  options: RendererOptions,
): string => createRenderer(format, options).render(history);
