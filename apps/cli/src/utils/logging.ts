/**
 * Logger for command handlers, with its level taken from the resolved
 * `--log-level` and `-v` values.
 */

import type { ResolvedValues } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import type { Logger } from "@argloom/shared";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type CliLogLevel = (typeof LOG_LEVELS)[number];

function isCliLogLevel(value: string | undefined): value is CliLogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Each `-v` lowers the threshold by one level, down to debug. */
export function logLevelFor(values: ResolvedValues): CliLogLevel {
  const requested = values.string("log-level");
  const base = isCliLogLevel(requested) ? LOG_LEVELS.indexOf(requested) : LOG_LEVELS.indexOf("warn");
  const verbosity = values.number("verbose") ?? 0;
  return LOG_LEVELS[Math.max(0, base - verbosity)] ?? "debug";
}

export function createCliLogger(values: ResolvedValues, name: string): Logger {
  return createLogger(`argloom-demo:${name}`, { level: logLevelFor(values) });
}
