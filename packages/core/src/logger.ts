import type { LogEntry, LogLevel, Logger } from "@clubhouse/types";

export const LOG_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
];

const rank = (level: LogLevel) => LOG_LEVELS.indexOf(level);

export interface ConsoleLoggerOptions {
  /** Component name stamped on every entry. */
  component?: string;
  /** Minimum level written. Default: "info". */
  level?: LogLevel;
  /** Where serialized entries go. Default: console.log / console.error by level. */
  write?: (line: string, entry: LogEntry) => void;
}

function defaultWrite(line: string, entry: LogEntry): void {
  if (rank(entry.level) >= rank("warn")) {
    console.error(line);
  } else {
    console.log(line);
  }
}

/**
 * Structured logger writing one JSON object per line.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minRank = rank(options.level ?? "info");
  const write = options.write ?? defaultWrite;

  const method =
    (level: LogLevel) =>
    (message: string, data?: Record<string, unknown>): void => {
      if (rank(level) < minRank) return;
      const entry: LogEntry = {
        timestamp: new Date().toISOString(),
        level,
        message,
        ...(options.component ? { component: options.component } : {}),
        ...(data ? { data } : {}),
      };
      write(JSON.stringify(entry), entry);
    };

  return {
    trace: method("trace"),
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
    fatal: method("fatal"),
    child(component: string): Logger {
      return createConsoleLogger({
        ...options,
        component: options.component ? `${options.component}.${component}` : component,
      });
    },
  };
}

const noop = () => {};

/** Discards everything. */
export const silentLogger: Logger = {
  trace: noop,
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
  fatal: noop,
  child: () => silentLogger,
};
