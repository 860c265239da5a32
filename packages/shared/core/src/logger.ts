/**
 * Scoped line logger.
 *
 * Lines go to an append-only file when `filePath` is set, and to stderr when
 * `stderr` is enabled. Local sessions own the terminal, so they log to the
 * file only. Debug lines are dropped unless `debug` is on.
 */
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  filePath?: string;
  stderr?: boolean;
  debug?: boolean;
  /** Clock override for tests. */
  now?: () => Date;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  /** Derive a logger sharing the same sinks under another scope. */
  child(scope: string): Logger;
}

export function formatLogLine(ts: Date, level: LogLevel, scope: string, msg: string): string {
  return `[${ts.toISOString()}] ${level.toUpperCase()} [${scope}] ${msg}`;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const now = options.now ?? (() => new Date());
  let dirReady = false;

  const emit = (level: LogLevel, msg: string): void => {
    if (level === "debug" && !options.debug) return;
    const line = formatLogLine(now(), level, scope, msg);

    if (options.filePath) {
      try {
        if (!dirReady) {
          mkdirSync(dirname(options.filePath), { recursive: true });
          dirReady = true;
        }
        appendFileSync(options.filePath, `${line}\n`);
      } catch {
        // Logging must never break a session
      }
    }
    if (options.stderr) {
      console.error(line);
    }
  };

  return {
    debug: (msg) => emit("debug", msg),
    info: (msg) => emit("info", msg),
    warn: (msg) => emit("warn", msg),
    error: (msg) => emit("error", msg),
    child: (childScope) => createLogger(`${scope}:${childScope}`, options),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => silentLogger,
};
