/**
 * Minimal structured logger used by the router and its breakers.
 *
 * The console logger writes `[tag] message {fields}` lines, the same
 * bracket-prefixed shape the rest of the codebase logs with.
 */

export type LogFields = Readonly<Record<string, unknown>>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface ConsoleLoggerOptions {
  /** Lowest level written. Defaults to "info". */
  readonly level?: LogLevel;
}

export function formatLogLine(tag: string, message: string, fields?: LogFields): string {
  if (fields === undefined || Object.keys(fields).length === 0) {
    return `[${tag}] ${message}`;
  }
  return `[${tag}] ${message} ${JSON.stringify(fields)}`;
}

export function createConsoleLogger(tag: string, options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? "info"];
  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = formatLogLine(tag, message, fields);
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
  };
}

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
