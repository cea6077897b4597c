export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

const logLevelRank: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

export type LogSink = (line: string) => void;

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const stderrSink: LogSink = (line) => {
  process.stderr.write(line);
};

/** Logs go to stderr so stdout carries only the rendered history. */
export const createStderrLogger = (level: LogLevel, sink: LogSink = stderrSink): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const threshold = logLevelRank[level];
  const writerFor =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (logLevelRank[messageLevel] <= threshold) {
        sink(`[lineage] ${messageLevel.toUpperCase()} ${message}\n`);
      }
    };

  return {
    error: writerFor("error"),
    warn: writerFor("warn"),
    info: writerFor("info"),
    debug: writerFor("debug"),
  };
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case "silent":
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return "warn";
  }
};
