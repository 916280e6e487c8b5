/**
 * Structured diagnostics logger.
 *
 * Everything goes to stderr: stdout is reserved for --help output.
 * - JSON entries when LOG_FORMAT=json, one line per entry
 * - Level filtering via LOG_LEVEL (debug | info | warn | error, default info)
 * - Persistent context (endpoint, action) inherited by child loggers
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LogContext {
  /** Socket path or pipe name of the update engine. */
  endpoint?: string;
  /** Primary action being dispatched (suspend, update, ...). */
  action?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge persistent context fields into every subsequent entry. */
  setContext(ctx: LogContext): void;
  /** Start a timer. The returned stop function logs at debug and returns elapsed ms. */
  time(label: string): () => number;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  let context: LogContext = { ...parentContext };

  function log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    // Resolved per entry so LOG_LEVEL set after import still applies.
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[resolveMinLevel(minLevel)]) return;

    const timestamp = new Date().toISOString();
    const fields: Record<string, unknown> = { ...context, ...data };

    if (isJsonFormat()) {
      console.error(JSON.stringify({ timestamp, level, module: name, message, ...fields }));
      return;
    }

    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]`;
    if (Object.keys(fields).length > 0) {
      console.error(`${prefix} ${message} ${JSON.stringify(fields)}`);
    } else {
      console.error(`${prefix} ${message}`);
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, minLevel, { ...context }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    time(label: string): () => number {
      const start = performance.now();
      return () => {
        const durationMs = Math.round((performance.now() - start) * 100) / 100;
        log("debug", `${label} completed`, { label, durationMs });
        return durationMs;
      };
    },
  };
}
