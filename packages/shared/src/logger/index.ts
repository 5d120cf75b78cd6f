/**
 * Structured logger with JSON output support.
 *
 * Features:
 * - JSON-structured log lines on stderr (when LOG_FORMAT=json)
 * - Level filtering via LOG_LEVEL ("silent" turns everything off)
 * - Persistent context (invocationId, command, ...) rendered as snake_case fields
 * - Child loggers inherit level and context
 */

import { performance } from "node:perf_hooks";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type EmitLevel = Exclude<LogLevel, "silent">;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface LogContext {
  invocationId?: string;
  command?: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  /** Overrides LOG_LEVEL */
  level?: LogLevel;
  /** Overrides LOG_FORMAT */
  format?: "text" | "json";
  context?: LogContext;
}

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  child(name: string): Logger;
  /** Merge persistent context fields into every later entry. */
  setContext(ctx: LogContext): void;
  isLevelEnabled(level: EmitLevel): boolean;
  /** Start a timer. The returned stop function logs elapsed time at debug and returns it in ms. */
  time(label: string): () => number;
}

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

/** Resolve min log level from options, then environment. */
function resolveMinLevel(explicit?: LogLevel): LogLevel {
  if (explicit) return explicit;
  const env = (process.env.LOG_LEVEL ?? "").toLowerCase();
  return isLogLevel(env) ? env : "info";
}

function resolveFormat(explicit?: "text" | "json"): "text" | "json" {
  if (explicit) return explicit;
  return process.env.LOG_FORMAT?.toLowerCase() === "json" ? "json" : "text";
}

function toSnakeCase(key: string): string {
  return key.replace(/[A-Z]/g, (c) => `_${c.toLowerCase()}`);
}

export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const minLevel = resolveMinLevel(options.level);
  const minPriority = LEVEL_PRIORITY[minLevel];
  const format = resolveFormat(options.format);
  let context: LogContext = { ...options.context };

  function log(level: EmitLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < minPriority) return;

    const timestamp = new Date().toISOString();
    const hasData = data !== undefined && Object.keys(data).length > 0;

    if (format === "json") {
      const entry: Record<string, unknown> = { timestamp, level, module: name, message };
      for (const [key, value] of Object.entries(context)) {
        if (value !== undefined) entry[toSnakeCase(key)] = value;
      }
      if (hasData) Object.assign(entry, data);
      console.error(JSON.stringify(entry));
      return;
    }

    const scope = context.invocationId ? ` [${context.invocationId}]` : "";
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${name}]${scope}`;
    console.error(hasData ? `${prefix} ${message} ${JSON.stringify(data)}` : `${prefix} ${message}`);
  }

  return {
    debug: (msg, data) => log("debug", msg, data),
    info: (msg, data) => log("info", msg, data),
    warn: (msg, data) => log("warn", msg, data),
    error: (msg, data) => log("error", msg, data),
    child: (childName) =>
      createLogger(`${name}:${childName}`, { level: minLevel, format, context: { ...context } }),
    setContext(ctx: LogContext): void {
      context = { ...context, ...ctx };
    },
    isLevelEnabled(level: EmitLevel): boolean {
      return LEVEL_PRIORITY[level] >= minPriority;
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
