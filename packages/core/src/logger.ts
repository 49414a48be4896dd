export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

type MessageLevel = Exclude<LogLevel, "silent">;

const logLevelRank: Readonly<Record<MessageLevel, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export type Logger = {
  error: (message: string) => void;
  warn: (message: string) => void;
  info: (message: string) => void;
  debug: (message: string) => void;
};

export type LogSink = {
  write: (line: string) => unknown;
};

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const shouldLog = (configuredLevel: LogLevel, messageLevel: MessageLevel): boolean => {
  if (configuredLevel === "silent") {
    return false;
  }

  return logLevelRank[messageLevel] <= logLevelRank[configuredLevel];
};

export const formatLogLine = (messageLevel: MessageLevel, message: string): string =>
  `[repometrics] ${messageLevel.toUpperCase()} ${message}\n`;

/**
 * Line-oriented logger writing to any sink with a `write` method.
 * Diagnostics never go to stdout so the JSON report stays parseable.
 */
export const createSinkLogger = (level: LogLevel, sink: LogSink): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const emit =
    (messageLevel: MessageLevel) =>
    (message: string): void => {
      if (shouldLog(level, messageLevel)) {
        sink.write(formatLogLine(messageLevel, message));
      }
    };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
};

export const createStderrLogger = (level: LogLevel): Logger => createSinkLogger(level, process.stderr);

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value?.trim().toLowerCase()) {
    case "silent":
      return "silent";
    case "error":
      return "error";
    case "warn":
    case "warning":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    default:
      return "info";
  }
};
