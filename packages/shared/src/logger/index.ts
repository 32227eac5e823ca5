/**
 * Structured logger for the dispatch engine.
 *
 * - Plain or JSON lines (LOG_FORMAT=json), always on stderr so command output stays clean
 * - Level filtering via LOG_LEVEL (default: warn)
 * - invocation_id / command fields once an invocation is underway
 * - Child loggers inherit context
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
  invocationId?: string;
  command?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge persistent context fields (invocationId, command, ...) */
  setContext(ctx: LogContext): void;
  /** Start a timer. Returns a stop function that logs elapsed time and returns duration in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from environment. CLI output is the product, so the default is quiet. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "warn";
}

function isJsonFormat(): boolean {
  return process.env.LOG_FORMAT?.toLowerCase() === "json";
}

export function createLogger(
  name: string,
  minLevel?: LogLevel,
  parentContext?: LogContext,
): Logger {
  const level = resolveMinLevel(minLevel);
  const minPriority = LEVEL_PRIORITY[level];
  const useJson = isJsonFormat();
  let context: LogContext = { ...parentContext };

  function log(
    entryLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (LEVEL_PRIORITY[entryLevel] < minPriority) return;

    const timestamp = new Date().toISOString();

    if (useJson) {
      const entry: Record<string, unknown> = {
        timestamp,
        level: entryLevel,
        module: name,
        message,
      };
      if (context.invocationId) entry.invocation_id = context.invocationId;
      if (context.command) entry.command = context.command;
      if (data && Object.keys(data).length > 0) {
        Object.assign(entry, data);
      }
      console.error(JSON.stringify(entry));
    } else {
      const prefix = `[${timestamp}] [${entryLevel.toUpperCase()}] [${name}]`;
      const scope = context.command ? ` (${context.command})` : "";
      if (data && Object.keys(data).length > 0) {
        console.error(`${prefix}${scope} ${message} ${JSON.stringify(data)}`);
      } else {
        console.error(`${prefix}${scope} ${message}`);
      }
    }
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) => createLogger(`${name}:${childName}`, level, { ...context }),
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
