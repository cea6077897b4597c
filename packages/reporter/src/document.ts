import { formatUtcTimestamp, shortenHash, type LineHistory } from "@lineage/core";
import type { SerializedLineHistory } from "./domain.js";

export const toSerializedLineHistory = (history: LineHistory): SerializedLineHistory => ({
  filePath: history.filePath,
  lineNumber: history.lineNumber,
  entries: history.events.map((event) => ({
    commitHash: event.commitHash,
    shortHash: shortenHash(event.commitHash),
    author: event.author,
    timestamp: formatUtcTimestamp(event.authoredAtUnix),
    changeType: event.changeType,
    message: event.message,
    ...(event.content.length === 0 ? {} : { content: event.content }),
  })),
});

/** Runs a renderer body; any exception becomes the format's fixed placeholder. */
export const renderSafely = (render: () => string, fallback: string): string => {
  try {
    return render();
  } catch {
    return fallback;
  }
};
