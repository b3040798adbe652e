/* eslint-disable no-console */
import type { Logger } from "./core.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_NAMES: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: string): value is LogLevel {
  return LEVEL_NAMES.has(value);
}

type Sink = Pick<Console, LogLevel>;

export interface ConsoleLoggerOptions {
  /** Lowest level written; quieter calls are dropped */
  readonly level?: LogLevel;
  readonly sink?: Sink;
  readonly now?: () => Date;
}

export function createConsoleLogger(namespace: string, options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? "info");
  const sink = options.sink ?? console;
  const now = options.now ?? (() => new Date());

  const write = (level: LogLevel, message: string, meta: unknown): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    sink[level](`${now().toISOString()} ${level.toUpperCase()} [${namespace}]`, message, meta ?? "");
  };

  return {
    info(message: string, meta?: unknown): void {
      write("info", message, meta);
    },
    warn(message: string, meta?: unknown): void {
      write("warn", message, meta);
    },
    error(message: string, meta?: unknown): void {
      write("error", message, meta);
    },
    debug(message: string, meta?: unknown): void {
      write("debug", message, meta);
    },
  } satisfies Logger;
}
