import fs from "node:fs";
import path from "node:path";
import type { LogEntry, LogLevel } from "@switchboard/types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/** Receives each serialized entry that passed the level threshold. */
export type LogSink = (line: string, entry: LogEntry) => void;

export interface Logger {
  readonly component: string;
  readonly level: LogLevel;
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  fatal(message: string, data?: Record<string, unknown>): void;
  /** Same sink and threshold, nested component name. */
  child(component: string): Logger;
}

export interface LoggerOptions {
  readonly component: string;
  readonly level?: LogLevel;
  readonly sink?: LogSink;
}

export const consoleSink: LogSink = (line, entry) => {
  if (LEVEL_ORDER[entry.level] >= LEVEL_ORDER.error) {
    console.error(line);
  } else {
    console.log(line);
  }
};

export const silentSink: LogSink = () => undefined;

/**
 * Appends one JSON line per entry to `file`, creating its directory.
 */
export function fileSink(file: string): LogSink {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  return (line) => {
    fs.appendFileSync(file, `${line}\n`, "utf8");
  };
}

/**
 * Structured JSON-lines logger. Nothing is configured globally: callers
 * build one and hand it to the components that need it.
 */
export function createLogger(options: LoggerOptions): Logger {
  const level = options.level ?? "info";
  const sink = options.sink ?? consoleSink;
  const threshold = LEVEL_ORDER[level];

  const write = (entryLevel: LogLevel, message: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] < threshold) return;
    const entry: LogEntry = {
      level: entryLevel,
      message,
      timestamp: new Date().toISOString(),
      component: options.component,
      ...(data ? { data } : {}),
    };
    sink(JSON.stringify(entry), entry);
  };

  return {
    component: options.component,
    level,
    trace: (message, data) => write("trace", message, data),
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
    fatal: (message, data) => write("fatal", message, data),
    child: (component) =>
      createLogger({ component: `${options.component}.${component}`, level, sink }),
  };
}

export const silentLogger: Logger = createLogger({ component: "silent", sink: silentSink });
