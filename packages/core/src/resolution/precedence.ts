/**
 * Precedence resolver — merges command line, environment, config file and
 * defaults into one typed value per argument on the matched path.
 *
 * First supplied source wins, in that order. Arguments with the `append`
 * policy concatenate every supplied source instead.
 */

import { VALUE_SOURCE_PRIORITY, ValueError } from "@argloom/sdk";
import type {
  ArgumentDef,
  ConfigMapping,
  ConfigValue,
  EnvironmentSnapshot,
  MatchResult,
  ParseSources,
  ResolvedValue,
  ValueParser,
  ValueSource,
} from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import type { CompiledDefinition } from "../definition/index.js";
import { displayName, isMultiValued } from "../definition/index.js";

const logger = createLogger("Resolver");

/** A source either supplied typed values, explicitly unset the argument, or said nothing. */
type SourceReading =
  | { readonly kind: "values"; readonly values: unknown[] }
  | { readonly kind: "unset" }
  | undefined;

interface ResolveContext {
  readonly def: ArgumentDef;
  readonly parser: ValueParser;
  readonly label: string;
}

function parseLiteral(ctx: ResolveContext, literal: string, source: ValueSource, label = ctx.label): unknown {
  const result = ctx.parser(literal);
  if (!result.success) throw result.error.withContext({ argument: ctx.def.name, label, source });
  return result.value;
}

function absentValue(def: ArgumentDef): unknown {
  if (def.action === "count") return 0;
  if (def.kind.type === "bool") return false;
  if (isMultiValued(def)) return [];
  return undefined;
}

// ─── Sources ───

function readCommandLine(ctx: ResolveContext, match: MatchResult): SourceReading {
  const occurrences = match.occurrences.get(ctx.def);
  if (!occurrences || occurrences.length === 0) return undefined;
  const { def } = ctx;

  if (def.action === "count") return { kind: "values", values: [occurrences.length] };
  if (def.kind.type === "bool") return { kind: "values", values: [true] };

  // Non-repeatable arguments keep their last occurrence
  const used = def.repeatable ? occurrences : occurrences.slice(-1);
  const values: unknown[] = [];
  for (const occurrence of used) {
    for (const literal of occurrence.values) {
      values.push(parseLiteral(ctx, literal, "commandLine", occurrence.flag ?? ctx.label));
    }
  }
  return { kind: "values", values };
}

function readEnvironment(ctx: ResolveContext, env: EnvironmentSnapshot | undefined): SourceReading {
  const name = ctx.def.env;
  if (name === undefined || env === undefined) return undefined;
  const literal = env[name];
  if (literal === undefined || literal === "") return undefined;
  return { kind: "values", values: [parseLiteral(ctx, literal, "environment")] };
}

function isList(value: ConfigValue | undefined): value is readonly ConfigValue[] {
  return Array.isArray(value);
}

function isMapping(value: ConfigValue | undefined): value is ConfigMapping {
  return typeof value === "object" && value !== null && !isList(value);
}

/** Config keys nest under the subcommand names leading to the declaring command. */
export function configPath(definition: CompiledDefinition, def: ArgumentDef): string[] {
  return [...definition.ownerOf(def).path.slice(1), ...def.configKey.split(".")];
}

function lookupConfig(config: ConfigMapping, keys: readonly string[]): ConfigValue | undefined {
  let current: ConfigValue | undefined = config;
  for (const key of keys) {
    if (!isMapping(current) || !Object.hasOwn(current, key)) return undefined;
    current = current[key];
  }
  return current;
}

function configLiteral(value: ConfigValue): string | undefined {
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return undefined;
}

function invalidConfig(ctx: ResolveContext, value: ConfigValue, expected: string): never {
  throw new ValueError("InvalidValue", JSON.stringify(value), expected, {
    argument: ctx.def.name,
    label: ctx.label,
    source: "configFile",
  });
}

function configLiterals(ctx: ResolveContext, value: ConfigValue): string[] {
  const { def } = ctx;
  const multi = isMultiValued(def);

  if (isList(value)) {
    if (def.kind.type === "list" && !multi) {
      const parts = value.map((item) => configLiteral(item));
      if (parts.some((p) => p === undefined)) invalidConfig(ctx, value, "a list of scalar values");
      return [parts.join(def.kind.separator)];
    }
    if (!multi) invalidConfig(ctx, value, "a single value");
    return value.map((item) => configLiteral(item) ?? invalidConfig(ctx, item, "a scalar value"));
  }

  if (isMapping(value)) {
    if (def.kind.type !== "keyValue") invalidConfig(ctx, value, "a scalar value");
    const pairs = Object.entries(value).map(
      ([key, item]) => `${key}=${configLiteral(item) ?? invalidConfig(ctx, item, "a scalar value")}`,
    );
    if (!multi && pairs.length !== 1) invalidConfig(ctx, value, "a single KEY=VALUE entry");
    return pairs;
  }

  const literal = configLiteral(value);
  return literal === undefined ? [] : [literal];
}

function readConfig(
  ctx: ResolveContext,
  definition: CompiledDefinition,
  config: ConfigMapping | undefined,
): SourceReading {
  if (config === undefined) return undefined;
  const value = lookupConfig(config, configPath(definition, ctx.def));
  if (value === undefined) return undefined;
  if (value === null) return { kind: "unset" };

  const literals = configLiterals(ctx, value);
  return { kind: "values", values: literals.map((literal) => parseLiteral(ctx, literal, "configFile")) };
}

function readDefaults(ctx: ResolveContext): SourceReading {
  if (ctx.def.defaults.length === 0) return undefined;
  return { kind: "values", values: ctx.def.defaults.map((literal) => parseLiteral(ctx, literal, "default")) };
}

// ─── Merge ───

function collapse(def: ArgumentDef, values: unknown[]): unknown {
  return isMultiValued(def) ? values : values[values.length - 1];
}

function resolveArgument(
  ctx: ResolveContext,
  definition: CompiledDefinition,
  match: MatchResult,
  sources: ParseSources,
): ResolvedValue {
  const { def } = ctx;
  const readers: Record<ValueSource, () => SourceReading> = {
    commandLine: () => readCommandLine(ctx, match),
    environment: () => readEnvironment(ctx, sources.env),
    configFile: () => readConfig(ctx, definition, sources.config),
    default: () => readDefaults(ctx),
  };

  if (def.accumulation !== "append") {
    for (const source of VALUE_SOURCE_PRIORITY) {
      const reading = readers[source]();
      if (reading?.kind === "unset") return { value: absentValue(def), sources: [] };
      if (reading) return { value: collapse(def, reading.values), source, sources: [source] };
    }
    return { value: absentValue(def), sources: [] };
  }

  // Defaults only apply when no other source contributed
  const values: unknown[] = [];
  const contributed: ValueSource[] = [];
  let unset = false;
  for (const source of VALUE_SOURCE_PRIORITY) {
    if (source === "default") continue;
    const reading = readers[source]();
    if (reading?.kind === "values") {
      values.push(...reading.values);
      contributed.push(source);
    } else if (reading?.kind === "unset") {
      unset = true;
    }
  }
  if (contributed.length > 0) return { value: values, source: contributed[0], sources: contributed };
  if (unset) return { value: absentValue(def), sources: [] };

  const defaults = readers.default();
  if (defaults?.kind === "values") return { value: collapse(def, defaults.values), source: "default", sources: ["default"] };
  return { value: absentValue(def), sources: [] };
}

/**
 * Resolve every argument declared along the matched path.
 * Throws ValueError for the first literal that does not parse.
 */
export function resolveValues(
  definition: CompiledDefinition,
  match: MatchResult,
  sources: ParseSources = {},
): Map<ArgumentDef, ResolvedValue> {
  const resolved = new Map<ArgumentDef, ResolvedValue>();

  for (const node of match.path) {
    for (const def of node.arguments) {
      const parser = definition.parserFor(def);
      if (!parser) continue;

      const value = resolveArgument({ def, parser, label: displayName(def) }, definition, match, sources);
      if (value.source !== undefined && value.source !== "commandLine") {
        logger.debug(`"${def.name}" taken from ${value.sources.join(" + ")}`);
      }
      resolved.set(def, value);
    }
  }

  return resolved;
}
