/**
 * Match and resolution results.
 */

import type { ArgumentDef } from "./argument.js";
import type { CommandNode } from "./command.js";

/** Where a resolved value came from, highest priority first. */
export type ValueSource = "commandLine" | "environment" | "configFile" | "default";

export const VALUE_SOURCE_PRIORITY: readonly ValueSource[] = [
  "commandLine",
  "environment",
  "configFile",
  "default",
];

/** One occurrence of an argument on the command line. */
export interface RawOccurrence {
  /** Raw literals consumed by this occurrence */
  readonly values: readonly string[];
  /** Spelling used (`--port`, `-p`); undefined for positionals */
  readonly flag?: string;
}

export interface MatchResult {
  readonly source: "commandLine";
  /** Root to matched node */
  readonly path: readonly CommandNode[];
  readonly occurrences: ReadonlyMap<ArgumentDef, readonly RawOccurrence[]>;
}

export interface ResolvedValue<T = unknown> {
  readonly value: T;
  /** Winning source; undefined when the value is the kind's absent representation */
  readonly source?: ValueSource;
  /** Every source that contributed, in priority order */
  readonly sources: readonly ValueSource[];
}

/**
 * Final typed values for a matched command path.
 *
 * Lookups by name search the matched command first, then its ancestors.
 */
export interface ResolvedValues {
  get(name: string): unknown;
  entry(name: string): ResolvedValue | undefined;
  /** True when any source (defaults included) supplied a value */
  has(name: string): boolean;
  source(name: string): ValueSource | undefined;
  string(name: string): string | undefined;
  number(name: string): number | undefined;
  boolean(name: string): boolean;
  strings(name: string): string[];
  names(): string[];
  toObject(): Record<string, unknown>;
}
