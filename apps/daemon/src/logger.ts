export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export type Logger = {
  readonly debug: (message: string, fields?: LogFields) => void;
  readonly info: (message: string, fields?: LogFields) => void;
  readonly warn: (message: string, fields?: LogFields) => void;
  readonly error: (message: string, fields?: LogFields) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export const isLogLevel = (value: string): value is LogLevel => Object.hasOwn(LEVEL_RANK, value);

const write = (level: LogLevel, message: string, fields?: LogFields): void => {
  const payload = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...fields
  };
  const text = JSON.stringify(payload);
  if (level === "error") {
    console.error(text);
    return;
  }
  if (level === "warn") {
    console.warn(text);
    return;
  }
  if (level === "debug") {
    console.debug(text);
    return;
  }
  console.info(text);
};

export const createLogger = (minimumLevel: LogLevel = "info"): Logger => {
  const log = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) {
      return;
    }
    write(level, message, fields);
  };
  return {
    debug: (message, fields) => log("debug", message, fields),
    info: (message, fields) => log("info", message, fields),
    warn: (message, fields) => log("warn", message, fields),
    error: (message, fields) => log("error", message, fields)
  };
};

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase() ?? "";

export const logger = createLogger(isLogLevel(envLevel) ? envLevel : "info");
