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

export type LogSink = (line: string) => void;

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const writeToStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const threshold = logLevelRank[level];
  const emitter = (messageLevel: MessageLevel) => (message: string) => {
    if (logLevelRank[messageLevel] <= threshold) {
      sink(`[cochange] ${messageLevel.toUpperCase()} ${message}`);
    }
  };

  return {
    error: emitter("error"),
    warn: emitter("warn"),
    info: emitter("info"),
    debug: emitter("debug"),
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
      return "info";
  }
};
