/**
 * Plain-text rendering of help, version and error output.
 */

import { UsageError } from "@argloom/sdk";
import type { ArgumentDef, DisplayRequest, ParseFailure } from "@argloom/sdk";
import { flagSpellings, isPresenceOnly } from "@argloom/core";
import type { CompiledDefinition, CompiledNode } from "@argloom/core";

const HELP_SUBCOMMAND_DESCRIPTION = "Print this message or the help of the given subcommand(s)";

// ─── Layout ───

function columns(rows: readonly (readonly [string, string])[]): string[] {
  const width = Math.max(...rows.map(([left]) => left.length));
  return rows.map(([left, right]) => `  ${left.padEnd(width)}  ${right}`.trimEnd());
}

function placeholder(def: ArgumentDef): string {
  return (def.valueName ?? def.name).toUpperCase();
}

function valueSuffix(def: ArgumentDef): string {
  if (isPresenceOnly(def)) return "";
  const value = `<${placeholder(def)}>`;
  const { arity } = def;
  if (arity.kind === "fixed") return ` ${Array.from({ length: arity.count }, () => value).join(" ")}`;
  const repeated = arity.kind === "rest" || arity.max > 1 ? `${value}...` : value;
  return arity.min === 0 ? ` [${repeated}]` : ` ${repeated}`;
}

function positionalUsage(def: ArgumentDef): string {
  const name = def.valueName ?? def.name;
  const many = def.trailing || def.arity.kind === "rest" || (def.arity.kind === "range" && def.arity.max > 1);
  const text = def.required ? `<${name}>` : `[${name}]`;
  return many ? `${text}...` : text;
}

function annotations(def: ArgumentDef): string {
  const notes: string[] = [];
  if (def.env !== undefined) notes.push(`[env: ${def.env}]`);
  if (def.defaults.length > 0) notes.push(`[default: ${def.defaults.join(", ")}]`);
  if (def.kind.type === "enum") notes.push(`[possible values: ${def.kind.values.join(", ")}]`);
  return notes.join(" ");
}

function describe(def: ArgumentDef): string {
  return [def.description, annotations(def)].filter((part) => part.length > 0).join(" ");
}

// ─── Sections ───

export function usageLine(compiled: CompiledNode): string {
  const parts = [compiled.path.join(" ")];
  if (compiled.visible.some((def) => !def.positional && !def.hidden)) parts.push("[OPTIONS]");
  for (const def of compiled.positionals) {
    if (!def.hidden) parts.push(positionalUsage(def));
  }
  if (compiled.node.children.length > 0) parts.push(compiled.handler ? "[COMMAND]" : "<COMMAND>");
  return parts.join(" ");
}

function commandRows(compiled: CompiledNode): [string, string][] {
  const rows: [string, string][] = compiled.node.children
    .filter((child) => !child.hidden)
    .map((child) => [child.name, child.description]);
  if (compiled.helpSubcommand) rows.push(["help", HELP_SUBCOMMAND_DESCRIPTION]);
  return rows;
}

function optionRows(compiled: CompiledNode): [string, string][] {
  return compiled.visible
    .filter((def) => !def.positional && !def.hidden)
    .map((def) => {
      const spellings = flagSpellings(def);
      const shortFirst = spellings.filter((s) => !s.startsWith("--")).concat(spellings.filter((s) => s.startsWith("--")));
      const indent = def.short === undefined && def.shortAliases.length === 0 ? "    " : "";
      return [`${indent}${shortFirst.join(", ")}${valueSuffix(def)}`, describe(def)];
    });
}

/** Help text for the command a display request points at. */
export function renderHelp(definition: CompiledDefinition, request: DisplayRequest): string {
  const compiled = definition.compiled(request.node);
  const blocks: string[] = [];

  if (request.node.description.length > 0) blocks.push(request.node.description);
  blocks.push(`Usage: ${usageLine(compiled)}`);

  const commands = commandRows(compiled);
  if (commands.length > 0) blocks.push(["Commands:", ...columns(commands)].join("\n"));

  const positionals = compiled.positionals.filter((def) => !def.hidden);
  if (positionals.length > 0) {
    const rows = positionals.map((def): [string, string] => [positionalUsage(def), describe(def)]);
    blocks.push(["Arguments:", ...columns(rows)].join("\n"));
  }

  const options = optionRows(compiled);
  if (options.length > 0) blocks.push(["Options:", ...columns(options)].join("\n"));

  return blocks.join("\n\n");
}

/** Subcommands without a version of their own report the root's. */
export function renderVersion(definition: CompiledDefinition, request: DisplayRequest): string {
  const version = request.node.version ?? definition.root.version ?? "unknown";
  return `${request.path.join(" ")} ${version}`;
}

/** Error message, the usage line of the failing command and a pointer to --help. */
export function renderError(definition: CompiledDefinition, error: ParseFailure): string {
  const lines = [`error: ${error.message}`];
  if (error instanceof UsageError) {
    const node = definition.find(error.path.slice(1));
    if (node) lines.push("", `Usage: ${usageLine(definition.compiled(node))}`);
  }
  lines.push("", "For more information, try '--help'.");
  return lines.join("\n");
}
