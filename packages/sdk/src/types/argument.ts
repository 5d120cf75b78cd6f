/**
 * Argument and argument-group definition types.
 */

/** Number of literal values a single occurrence of an argument consumes. */
export type Arity =
  | { readonly kind: "fixed"; readonly count: number }
  | { readonly kind: "range"; readonly min: number; readonly max: number }
  | { readonly kind: "rest"; readonly min: number };

/**
 * Value-kind descriptor used to look up a parser in the registry.
 *
 * `custom` kinds are registered by the application under `name`.
 */
export type ValueKind =
  | { readonly type: "string" }
  | { readonly type: "int"; readonly min?: number; readonly max?: number }
  | { readonly type: "uint"; readonly min?: number; readonly max?: number }
  | { readonly type: "float"; readonly min?: number; readonly max?: number }
  | { readonly type: "bool" }
  | { readonly type: "count" }
  | { readonly type: "path" }
  | { readonly type: "enum"; readonly values: readonly string[] }
  | { readonly type: "list"; readonly separator: string; readonly of: ValueKind }
  | { readonly type: "keyValue"; readonly of?: ValueKind }
  | { readonly type: "custom"; readonly name: string };

export type ValueKindType = ValueKind["type"];

/** How values from several sources combine for a multi-valued argument. */
export type AccumulationPolicy = "replace" | "append";

/**
 * What matching an argument does.
 * - set: store the value(s)
 * - count: count occurrences (-vvv)
 * - help / version: short-circuit with a display request
 */
export type ArgumentAction = "set" | "count" | "help" | "version";

/** A finalized, immutable argument definition. */
export interface ArgumentDef {
  /** Canonical name, unique within its command */
  readonly name: string;
  readonly description: string;

  /** Positional arguments have no flags and fill slots in declaration order */
  readonly positional: boolean;

  /** Primary short flag, without the dash (e.g. "p") */
  readonly short?: string;

  /** Primary long flag, without the dashes (e.g. "port") */
  readonly long?: string;

  readonly shortAliases: readonly string[];
  readonly longAliases: readonly string[];

  readonly arity: Arity;
  readonly kind: ValueKind;
  readonly action: ArgumentAction;

  /** Default literal(s); empty when there is no default */
  readonly defaults: readonly string[];

  /** Literal used when an optional-value flag is given without a value */
  readonly missingValue?: string;

  /** Bound environment variable, read by exact name */
  readonly env?: string;

  /** Key in the configuration mapping; dots nest */
  readonly configKey: string;

  readonly required: boolean;
  readonly conflictsWith: readonly string[];
  readonly requires: readonly string[];

  /** Owning group id */
  readonly group?: string;

  readonly accumulation: AccumulationPolicy;

  /** Collect every occurrence instead of keeping the last one */
  readonly repeatable: boolean;

  /** Visible to every descendant command */
  readonly global: boolean;

  /** Catch-all positional: absorbs every remaining token, flags included */
  readonly trailing: boolean;

  readonly hidden: boolean;
  readonly valueName?: string;
}

/** A named constraint over a set of arguments. */
export interface ArgGroup {
  readonly id: string;

  /** Explicit members plus every argument naming this group */
  readonly members: readonly string[];

  /** At least one member must be present */
  readonly required: boolean;

  /** More than one member may be present at the same time */
  readonly multiple: boolean;

  /** Group ids or argument names that may not appear alongside any member */
  readonly conflictsWith: readonly string[];
}
