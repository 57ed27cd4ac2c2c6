/**
 * Structured logging with level filtering.
 *
 * SECURITY: never pass keys, seeds, phrases, ciphertext or PEM bodies to
 * a logger. Only operational events with sanitized context.
 *
 * @module logger
 */
import type { LogLevel } from "./config.js";

const LOG_LEVELS = { error: 0, warn: 1, info: 2, debug: 3 } as const;

export interface Logger {
  error(msg: string): void;
  warn(msg: string): void;
  info(msg: string): void;
  debug(msg: string): void;
  /** Logger whose lines carry an extra `[scope]` tag. */
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level: LogLevel;
  timestamps?: boolean;
  /** Receives each formatted line. Defaults to stderr. */
  sink?: (line: string) => void;
}

export function createLogger(options: LoggerOptions, scope?: string): Logger {
  const threshold = LOG_LEVELS[options.level];
  const sink = options.sink ?? ((line: string) => console.error(line));

  function log(level: LogLevel, msg: string): void {
    if (LOG_LEVELS[level] > threshold) return;
    const ts = options.timestamps ? new Date().toISOString() + " " : "";
    const tag = scope ? ` [${scope}]` : "";
    sink(`${ts}[${level.toUpperCase()}]${tag} ${msg}`);
  }

  return {
    error: (msg) => log("error", msg),
    warn: (msg) => log("warn", msg),
    info: (msg) => log("info", msg),
    debug: (msg) => log("debug", msg),
    child: (child) => createLogger(options, scope ? `${scope}:${child}` : child),
  };
}

/** Discards everything; for callers that do not care about diagnostics. */
export const silentLogger: Logger = createLogger({ level: "error", sink: () => {} });
