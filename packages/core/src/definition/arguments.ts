/**
 * Derived facts about argument definitions.
 */

import type { ArgumentDef, Arity, ValueKind } from "@argloom/sdk";

export function minValues(arity: Arity): number {
  switch (arity.kind) {
    case "fixed":
      return arity.count;
    case "range":
    case "rest":
      return arity.min;
  }
}

export function maxValues(arity: Arity): number {
  switch (arity.kind) {
    case "fixed":
      return arity.count;
    case "range":
      return arity.max;
    case "rest":
      return Number.POSITIVE_INFINITY;
  }
}

/** Takes no literal on the command line (booleans, counters, help, version). */
export function isPresenceOnly(def: ArgumentDef): boolean {
  return def.action !== "set" || def.kind.type === "bool";
}

/** Resolves to an ordered list rather than a single value. */
export function isMultiValued(def: ArgumentDef): boolean {
  return !isPresenceOnly(def) && (def.repeatable || maxValues(def.arity) > 1);
}

/** Variable-arity positionals must come last. */
export function isVariableArity(arity: Arity): boolean {
  return minValues(arity) !== maxValues(arity);
}

/** How the argument is spelled in messages: `--port`, `-p`, `<file>`. */
export function displayName(def: ArgumentDef): string {
  if (def.positional) return `<${def.valueName ?? def.name}>`;
  if (def.long !== undefined) return `--${def.long}`;
  if (def.short !== undefined) return `-${def.short}`;
  const alias = def.longAliases[0];
  if (alias !== undefined) return `--${alias}`;
  const shortAlias = def.shortAliases[0];
  return shortAlias !== undefined ? `-${shortAlias}` : def.name;
}

/** Every flag spelling of an argument, primary first. */
export function flagSpellings(def: ArgumentDef): string[] {
  const spellings: string[] = [];
  if (def.long !== undefined) spellings.push(`--${def.long}`);
  for (const alias of def.longAliases) spellings.push(`--${alias}`);
  if (def.short !== undefined) spellings.push(`-${def.short}`);
  for (const alias of def.shortAliases) spellings.push(`-${alias}`);
  return spellings;
}

export function describeKind(kind: ValueKind): string {
  switch (kind.type) {
    case "custom":
      return kind.name;
    case "list":
      return `list of ${describeKind(kind.of)}`;
    case "keyValue":
      return kind.of ? `key=value of ${describeKind(kind.of)}` : "key=value";
    default:
      return kind.type;
  }
}
