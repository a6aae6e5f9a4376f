/**
 * Structured JSON logger. One object per line, written to stdout by default.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogData = { [key: string]: unknown };

export interface Logger {
  debug(message: string, data?: LogData): void;
  info(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
  error(message: string, data?: LogData): void;
  /** Logger that stamps `bindings` onto every entry */
  child(bindings: LogData): Logger;
}

const LEVEL_ORDER: { [level in LogLevel]: number } = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface JsonLoggerOptions {
  level?: LogLevel;
  stream?: { write(chunk: string): unknown };
  bindings?: LogData;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

export function createJsonLogger(options: JsonLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const stream = options.stream ?? process.stdout;
  const bindings = options.bindings ?? {};

  const write = (level: LogLevel, message: string, data?: LogData): void => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const entry = {
      time: new Date().toISOString(),
      level,
      msg: message,
      ...bindings,
      ...data,
    };
    stream.write(`${JSON.stringify(entry, replaceErrors)}\n`);
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
    child: (extra) =>
      createJsonLogger({ ...options, bindings: { ...bindings, ...extra } }),
  };
}

// Errors have no enumerable properties, so JSON.stringify would print {}
function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
