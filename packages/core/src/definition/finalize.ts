/**
 * finalize() — validate a builder tree once and compile it into an
 * immutable, shareable definition.
 *
 * Problems are collected, never thrown one by one. Global arguments are
 * shared by reference: a descendant's visible set holds the very same
 * ArgumentDef object its ancestor declared.
 */

import { ArgloomError, ErrorCode } from "@argloom/sdk";
import type {
  ArgGroup,
  ArgumentDef,
  BuildError,
  BuildErrorKind,
  CommandHandler,
  CommandNode,
  Definition,
  ValueKind,
  ValueParser,
} from "@argloom/sdk";
import { createLogger, validateInput } from "@argloom/shared";
import { createParserRegistry, type ParserRegistry } from "../parsers/index.js";
import type { ArgumentOptions, CommandBuilder, CommandSpec, GroupOptions } from "./builder.js";
import {
  describeKind,
  isMultiValued,
  isPresenceOnly,
  isVariableArity,
  maxValues,
} from "./arguments.js";
import { ArgumentOptionsSchema, CommandNameSchema, GroupOptionsSchema } from "./schema.js";

const logger = createLogger("Definition");

export interface FinalizeOptions {
  /** Registry used to resolve value kinds; a fresh built-in registry by default */
  parsers?: ParserRegistry;
}

export type FinalizeResult =
  | { valid: true; definition: CompiledDefinition }
  | { valid: false; errors: BuildError[] };

export interface CompiledGroup {
  readonly group: ArgGroup;
  readonly members: readonly ArgumentDef[];
  /** Arguments that may not appear alongside any member */
  readonly conflicts: readonly ArgumentDef[];
}

export interface CompiledNode {
  readonly node: CommandNode;
  readonly parent?: CompiledNode;
  /** Command names from the root, root included */
  readonly path: readonly string[];
  /** Inherited globals (root first), then own arguments */
  readonly visible: readonly ArgumentDef[];
  readonly byName: ReadonlyMap<string, ArgumentDef>;
  readonly longFlags: ReadonlyMap<string, ArgumentDef>;
  readonly shortFlags: ReadonlyMap<string, ArgumentDef>;
  readonly positionals: readonly ArgumentDef[];
  /** Child lookup by name and alias */
  readonly children: ReadonlyMap<string, CompiledNode>;
  readonly groups: readonly CompiledGroup[];
  readonly handler?: CommandHandler;
  readonly helpSubcommand: boolean;
  /** Show help instead of matching when nothing follows this command */
  readonly argRequiredElseHelp: boolean;
}

export interface CompiledDefinition extends Definition {
  readonly rootNode: CompiledNode;
  /** Routing table: space-joined command path → node */
  readonly routes: ReadonlyMap<string, CompiledNode>;
  compiled(node: CommandNode): CompiledNode;
  parserFor(def: ArgumentDef): ValueParser | undefined;
  conflictsOf(def: ArgumentDef): readonly ArgumentDef[];
  requirementsOf(def: ArgumentDef): readonly ArgumentDef[];
  /** Node that declares `def` */
  ownerOf(def: ArgumentDef): CompiledNode;
}

// ─── Drafts ───

interface DraftNode {
  spec: CommandSpec;
  path: string[];
  args: ArgumentDef[];
  groups: ArgGroup[];
  children: DraftNode[];
}

interface FrozenDraft {
  draft: DraftNode;
  node: CommandNode;
  children: FrozenDraft[];
}

class Collector {
  readonly errors: BuildError[] = [];

  add(kind: BuildErrorKind, path: readonly string[], message: string): void {
    this.errors.push({ kind, path: path.join(" "), message });
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function defaultKind(options: ArgumentOptions): ValueKind {
  if (options.kind) return options.kind;
  if (options.action === "count") return { type: "count" };
  if (options.action === "help" || options.action === "version") return { type: "bool" };
  return { type: "string" };
}

function normalizeArgument(options: ArgumentOptions): ArgumentDef {
  const kind = defaultKind(options);
  const action = options.action ?? (kind.type === "count" ? "count" : "set");
  const positional = options.positional ?? false;
  const presenceOnly = action !== "set" || kind.type === "bool";
  const defaults =
    options.default === undefined ? [] : typeof options.default === "string" ? [options.default] : [...options.default];

  return deepFreeze<ArgumentDef>({
    name: options.name,
    description: options.description ?? "",
    positional,
    short: positional ? undefined : options.short,
    long: positional || options.long === false ? undefined : (options.long ?? options.name),
    shortAliases: positional ? [] : [...(options.shortAliases ?? [])],
    longAliases: positional ? [] : [...(options.aliases ?? [])],
    arity:
      options.arity ??
      (presenceOnly
        ? { kind: "fixed", count: 0 }
        : options.trailing
          ? { kind: "rest", min: 0 }
          : { kind: "fixed", count: 1 }),
    kind,
    action,
    defaults,
    missingValue: options.missingValue,
    env: options.env,
    configKey: options.configKey ?? options.name,
    required: options.required ?? false,
    conflictsWith: [...(options.conflictsWith ?? [])],
    requires: [...(options.requires ?? [])],
    group: options.group,
    accumulation: options.accumulation ?? "replace",
    repeatable: options.repeatable ?? action === "count",
    global: options.global ?? false,
    trailing: options.trailing ?? false,
    hidden: options.hidden ?? false,
    valueName: options.valueName,
  });
}

function checkArity(def: ArgumentDef, path: readonly string[], out: Collector): void {
  const { arity } = def;
  const valid =
    arity.kind === "fixed"
      ? Number.isInteger(arity.count) && arity.count >= 0
      : arity.kind === "range"
        ? Number.isInteger(arity.min) && Number.isInteger(arity.max) && arity.min >= 0 && arity.max >= 1 && arity.min <= arity.max
        : Number.isInteger(arity.min) && arity.min >= 0;
  if (!valid) {
    out.add("InvalidArity", path, `Argument "${def.name}" has an invalid arity`);
    return;
  }
  if (isPresenceOnly(def) && maxValues(arity) !== 0) {
    out.add("InvalidArity", path, `Argument "${def.name}" is a flag and cannot take values`);
  }
  if (!isPresenceOnly(def) && maxValues(arity) === 0) {
    out.add("InvalidArity", path, `Argument "${def.name}" takes values but its arity is 0`);
  }
}

function checkArgumentShape(options: ArgumentOptions, def: ArgumentDef, path: readonly string[], out: Collector): void {
  const shape = validateInput(ArgumentOptionsSchema, options);
  if (!shape.success) {
    for (const issue of shape.issues) out.add("InvalidDefinition", path, `Argument "${options.name}": ${issue}`);
  }

  const hasFlags =
    options.short !== undefined ||
    (options.long !== undefined && options.long !== false) ||
    (options.aliases?.length ?? 0) > 0 ||
    (options.shortAliases?.length ?? 0) > 0;

  if (def.positional) {
    if (hasFlags) out.add("InvalidDefinition", path, `Positional argument "${def.name}" cannot have flags`);
    if (isPresenceOnly(def)) out.add("InvalidDefinition", path, `Positional argument "${def.name}" must take a value`);
    if (def.global) out.add("InvalidDefinition", path, `Positional argument "${def.name}" cannot be global`);
  } else {
    if (def.long === undefined && def.short === undefined && def.longAliases.length === 0 && def.shortAliases.length === 0) {
      out.add("InvalidDefinition", path, `Argument "${def.name}" has no flag; give it a short or long name or make it positional`);
    }
    if (def.trailing) out.add("InvalidDefinition", path, `Only positional arguments can be trailing ("${def.name}")`);
  }

  if (def.accumulation === "append" && !isMultiValued(def)) {
    out.add("InvalidDefinition", path, `Argument "${def.name}" uses the append policy but takes a single value`);
  }

  checkArity(def, path, out);
}

function checkPositionalOrder(args: readonly ArgumentDef[], path: readonly string[], out: Collector): void {
  const positionals = args.filter((a) => a.positional);
  positionals.forEach((def, index) => {
    const previous = positionals[index - 1];
    if (previous !== undefined && (isVariableArity(previous.arity) || previous.trailing)) {
      out.add(
        "InvalidDefinition",
        path,
        `Positional argument "${def.name}" follows variable-arity positional "${previous.name}"`,
      );
    }
    if (def.trailing && index !== positionals.length - 1) {
      out.add("InvalidDefinition", path, `Trailing positional "${def.name}" must be the last positional`);
    }
  });
}

function normalizeGroup(options: GroupOptions, args: readonly ArgumentDef[]): ArgGroup {
  const members = [...(options.members ?? [])];
  for (const def of args) {
    if (def.group === options.id && !members.includes(def.name)) members.push(def.name);
  }
  return deepFreeze<ArgGroup>({
    id: options.id,
    members,
    required: options.required ?? false,
    multiple: options.multiple ?? false,
    conflictsWith: [...(options.conflictsWith ?? [])],
  });
}

function helpArgument(short: string | undefined): ArgumentOptions {
  return { name: "help", short, long: "help", action: "help", global: true, description: "Print help" };
}

function versionArgument(short: string | undefined, global: boolean): ArgumentOptions {
  return { name: "version", short, long: "version", action: "version", global, description: "Print version" };
}

function usesShort(builder: CommandBuilder, flag: string, seen: Set<CommandBuilder>): boolean {
  if (seen.has(builder)) return false;
  seen.add(builder);
  const spec = builder.toSpec();
  return (
    spec.arguments.some((a) => a.short === flag || (a.shortAliases ?? []).includes(flag)) ||
    spec.children.some((child) => usesShort(child, flag, seen))
  );
}

function buildDraft(
  builder: CommandBuilder,
  parentPath: readonly string[],
  ancestors: ReadonlySet<CommandBuilder>,
  extraArgs: readonly ArgumentOptions[],
  out: Collector,
): DraftNode | undefined {
  const spec = builder.toSpec();
  const path = [...parentPath, spec.name];

  if (ancestors.has(builder)) {
    out.add("CyclicDefinition", parentPath, `Command "${spec.name}" contains itself`);
    return undefined;
  }

  for (const name of [spec.name, ...spec.aliases]) {
    const check = validateInput(CommandNameSchema, name);
    if (!check.success) out.add("InvalidDefinition", path, `Command name "${name}": ${check.error}`);
  }

  const options = [...spec.arguments, ...extraArgs];
  const args = options.map((o) => {
    const def = normalizeArgument(o);
    checkArgumentShape(o, def, path, out);
    return def;
  });
  checkPositionalOrder(args, path, out);

  const groups = spec.groups.map((g) => {
    const check = validateInput(GroupOptionsSchema, g);
    if (!check.success) out.add("InvalidDefinition", path, `Group "${g.id}": ${check.error}`);
    return normalizeGroup(g, args);
  });

  const inside = new Set(ancestors).add(builder);
  const children: DraftNode[] = [];
  for (const child of spec.children) {
    const draft = buildDraft(child, path, inside, [], out);
    if (draft) children.push(draft);
  }

  return { spec, path, args, groups, children };
}

function freezeDraft(draft: DraftNode): FrozenDraft {
  const children = draft.children.map(freezeDraft);
  const node = Object.freeze<CommandNode>({
    name: draft.spec.name,
    aliases: Object.freeze([...draft.spec.aliases]),
    description: draft.spec.description,
    version: draft.spec.version,
    hidden: draft.spec.hidden,
    arguments: Object.freeze([...draft.args]),
    groups: Object.freeze([...draft.groups]),
    children: Object.freeze(children.map((c) => c.node)),
  });
  return { draft, node, children };
}

// ─── Compilation ───

interface CompileState {
  out: Collector;
  registry: ParserRegistry;
  nodes: Map<CommandNode, CompiledNode>;
  routes: Map<string, CompiledNode>;
  owners: Map<ArgumentDef, CompiledNode>;
  parsers: Map<ArgumentDef, ValueParser>;
  conflicts: Map<ArgumentDef, Set<ArgumentDef>>;
  requirements: Map<ArgumentDef, ArgumentDef[]>;
}

function link(graph: Map<ArgumentDef, Set<ArgumentDef>>, a: ArgumentDef, b: ArgumentDef): void {
  const forA = graph.get(a) ?? new Set<ArgumentDef>();
  forA.add(b);
  graph.set(a, forA);
  const forB = graph.get(b) ?? new Set<ArgumentDef>();
  forB.add(a);
  graph.set(b, forB);
}

function registerFlags(
  map: Map<string, ArgumentDef>,
  spellings: readonly string[],
  def: ArgumentDef,
  prefix: string,
  report: ((message: string) => void) | undefined,
): void {
  for (const spelling of spellings) {
    const existing = map.get(spelling);
    if (existing && existing !== def) {
      report?.(`Flag "${prefix}${spelling}" is used by both "${existing.name}" and "${def.name}"`);
      continue;
    }
    map.set(spelling, def);
  }
}

function resolveParsers(def: ArgumentDef, path: readonly string[], state: CompileState): void {
  if (def.action === "help" || def.action === "version") return;

  const parser = state.registry.resolve(def.kind);
  if (!parser) {
    state.out.add("UnknownValueKind", path, `Argument "${def.name}" uses unknown value kind "${describeKind(def.kind)}"`);
    return;
  }
  state.parsers.set(def, parser);

  if (!isMultiValued(def) && def.defaults.length > 1) {
    state.out.add("InvalidDefault", path, `Argument "${def.name}" takes a single value but has ${def.defaults.length} defaults`);
  }
  const literals = def.missingValue === undefined ? def.defaults : [...def.defaults, def.missingValue];
  for (const literal of literals) {
    const result = parser(literal);
    if (!result.success) {
      state.out.add(
        "InvalidDefault",
        path,
        `Default value "${literal}" for argument "${def.name}" is invalid: expected ${result.error.expected}`,
      );
    }
  }
}

function compileNode(
  frozen: FrozenDraft,
  parent: CompiledNode | undefined,
  inherited: readonly ArgumentDef[],
  ancestorGroups: readonly CompiledGroup[],
  state: CompileState,
): CompiledNode {
  const { draft, node } = frozen;
  const { path } = draft;
  const { out } = state;

  const byName = new Map<string, ArgumentDef>();
  const longFlags = new Map<string, ArgumentDef>();
  const shortFlags = new Map<string, ArgumentDef>();

  for (const def of inherited) {
    byName.set(def.name, def);
    registerFlags(longFlags, def.long === undefined ? def.longAliases : [def.long, ...def.longAliases], def, "--", undefined);
    registerFlags(shortFlags, def.short === undefined ? def.shortAliases : [def.short, ...def.shortAliases], def, "-", undefined);
  }

  const report = (message: string): void => out.add("DuplicateName", path, message);
  for (const def of draft.args) {
    const existing = byName.get(def.name);
    if (existing) {
      report(
        existing.global && !draft.args.includes(existing)
          ? `Argument "${def.name}" is already declared as a global argument by an ancestor`
          : `Argument "${def.name}" is declared more than once`,
      );
    } else {
      byName.set(def.name, def);
    }
    registerFlags(longFlags, def.long === undefined ? def.longAliases : [def.long, ...def.longAliases], def, "--", report);
    registerFlags(shortFlags, def.short === undefined ? def.shortAliases : [def.short, ...def.shortAliases], def, "-", report);
  }

  const visible = [...inherited, ...draft.args];
  const children = new Map<string, CompiledNode>();
  const handler = draft.spec.handler;

  // Groups: members first, conflicts once every group of this node is known
  const groupIds = new Set<string>();
  const groupMembers = draft.groups.map((group) => {
    if (groupIds.has(group.id)) report(`Group "${group.id}" is declared more than once`);
    groupIds.add(group.id);
    const members: ArgumentDef[] = [];
    for (const name of group.members) {
      const def = byName.get(name);
      if (def) members.push(def);
      else out.add("DanglingGroupReference", path, `Group "${group.id}" refers to unknown argument "${name}"`);
    }
    return { group, members };
  });
  for (const def of draft.args) {
    if (def.group !== undefined && !groupIds.has(def.group)) {
      out.add("DanglingGroupReference", path, `Argument "${def.name}" refers to unknown group "${def.group}"`);
    }
  }

  const groupsInScope = new Map<string, readonly ArgumentDef[]>();
  for (const g of ancestorGroups) groupsInScope.set(g.group.id, g.members);
  for (const g of groupMembers) groupsInScope.set(g.group.id, g.members);

  const groups: CompiledGroup[] = groupMembers.map(({ group, members }) => {
    const conflicts: ArgumentDef[] = [];
    for (const target of group.conflictsWith) {
      const targetMembers = groupsInScope.get(target);
      const targetDef = byName.get(target);
      if (targetMembers) conflicts.push(...targetMembers.filter((d) => !members.includes(d)));
      else if (targetDef) conflicts.push(targetDef);
      else {
        out.add("DanglingGroupReference", path, `Group "${group.id}" conflicts with unknown group or argument "${target}"`);
      }
    }
    return { group, members, conflicts };
  });

  const compiled: CompiledNode = {
    node,
    parent,
    path,
    visible,
    byName,
    longFlags,
    shortFlags,
    positionals: draft.args.filter((a) => a.positional),
    children,
    groups,
    handler,
    helpSubcommand: draft.spec.helpSubcommand && draft.children.length > 0,
    argRequiredElseHelp: draft.spec.argRequiredElseHelp,
  };
  state.nodes.set(node, compiled);
  state.routes.set(path.join(" "), compiled);

  for (const def of draft.args) {
    state.owners.set(def, compiled);
    resolveParsers(def, path, state);

    for (const name of def.conflictsWith) {
      const other = byName.get(name);
      if (other) link(state.conflicts, def, other);
      else out.add("DanglingArgumentReference", path, `Argument "${def.name}" conflicts with unknown argument "${name}"`);
    }

    const required: ArgumentDef[] = [];
    for (const name of def.requires) {
      const other = byName.get(name);
      if (other) required.push(other);
      else out.add("DanglingArgumentReference", path, `Argument "${def.name}" requires unknown argument "${name}"`);
    }
    state.requirements.set(def, required);
  }

  if (frozen.children.length === 0 && !handler) {
    out.add("UnregisteredHandlerForLeaf", path, `Leaf command "${path.join(" ")}" has no handler`);
  }

  const passDown = [...inherited, ...draft.args.filter((a) => a.global)];
  const scopeGroups = [...ancestorGroups, ...groups];
  for (const child of frozen.children) {
    const compiledChild = compileNode(child, compiled, passDown, scopeGroups, state);
    for (const name of [child.node.name, ...child.node.aliases]) {
      if (children.has(name)) report(`Subcommand name "${name}" is used more than once`);
      else children.set(name, compiledChild);
    }
  }

  return compiled;
}

function checkImpossible(state: CompileState): void {
  const reported = new Set<string>();
  for (const [def, owner] of state.owners) {
    const conflicts = state.conflicts.get(def) ?? new Set<ArgumentDef>();
    if (def.required) {
      for (const other of conflicts) {
        const key = [def.name, other.name].sort().join("\u0000");
        if (other.required && !reported.has(key)) {
          reported.add(key);
          state.out.add(
            "ImpossibleConstraint",
            owner.path,
            `Required arguments "${def.name}" and "${other.name}" conflict with each other`,
          );
        }
      }
    }
    for (const needed of state.requirements.get(def) ?? []) {
      if (conflicts.has(needed)) {
        state.out.add("ImpossibleConstraint", owner.path, `Argument "${def.name}" requires "${needed.name}" but conflicts with it`);
      }
    }
  }

  for (const compiled of state.nodes.values()) {
    for (const { group, members } of compiled.groups) {
      const required = members.filter((m) => m.required);
      if (!group.multiple && required.length > 1) {
        state.out.add(
          "ImpossibleConstraint",
          compiled.path,
          `Group "${group.id}" allows one member but ${required.map((m) => `"${m.name}"`).join(" and ")} are all required`,
        );
      }
    }
  }
}

export function finalizeDefinition(root: CommandBuilder, options: FinalizeOptions = {}): FinalizeResult {
  const stop = logger.time("finalize");
  const out = new Collector();
  const rootSpec = root.toSpec();

  const builtins: ArgumentOptions[] = [];
  const declares = (name: string): boolean => rootSpec.arguments.some((a) => a.name === name);
  if (rootSpec.helpFlag && !declares("help")) {
    builtins.push(helpArgument(usesShort(root, "h", new Set()) ? undefined : "h"));
  }
  if (rootSpec.version !== undefined && !declares("version")) {
    builtins.push(versionArgument(usesShort(root, "V", new Set()) ? undefined : "V", rootSpec.propagateVersion));
  }

  const draft = buildDraft(root, [], new Set(), builtins, out);
  if (!draft) return { valid: false, errors: out.errors };

  const state: CompileState = {
    out,
    registry: options.parsers ?? createParserRegistry(),
    nodes: new Map(),
    routes: new Map(),
    owners: new Map(),
    parsers: new Map(),
    conflicts: new Map(),
    requirements: new Map(),
  };
  const rootNode = compileNode(freezeDraft(draft), undefined, [], [], state);
  checkImpossible(state);
  stop();

  if (out.errors.length > 0) {
    logger.debug(`Definition rejected with ${out.errors.length} problem(s)`);
    return { valid: false, errors: out.errors };
  }

  logger.debug(`Finalized ${state.routes.size} command(s)`);
  return { valid: true, definition: createCompiledDefinition(rootNode, state) };
}

function createCompiledDefinition(rootNode: CompiledNode, state: CompileState): CompiledDefinition {
  const { nodes, routes, owners, parsers, conflicts, requirements } = state;
  const frozenConflicts = new Map<ArgumentDef, readonly ArgumentDef[]>();
  for (const [def, set] of conflicts) frozenConflicts.set(def, Object.freeze([...set]));

  function compiled(node: CommandNode): CompiledNode {
    const found = nodes.get(node);
    if (!found) {
      throw new ArgloomError(`Command "${node.name}" does not belong to this definition`, ErrorCode.DEFINITION_INVALID);
    }
    return found;
  }

  return Object.freeze<CompiledDefinition>({
    root: rootNode.node,
    rootNode,
    routes,
    compiled,

    find(path: readonly string[]): CommandNode | undefined {
      let current: CompiledNode | undefined = rootNode;
      for (const name of path) {
        current = current?.children.get(name);
      }
      return current?.node;
    },

    pathOf: (node) => compiled(node).path,
    visibleArguments: (node) => compiled(node).visible,

    visibleGroups(node: CommandNode): readonly ArgGroup[] {
      const chain: ArgGroup[] = [];
      for (let c: CompiledNode | undefined = compiled(node); c; c = c.parent) {
        chain.unshift(...c.groups.map((g) => g.group));
      }
      return chain;
    },

    handlerFor: (node) => compiled(node).handler,
    parserFor: (def) => parsers.get(def),
    conflictsOf: (def) => frozenConflicts.get(def) ?? [],
    requirementsOf: (def) => requirements.get(def) ?? [],

    ownerOf(def: ArgumentDef): CompiledNode {
      const owner = owners.get(def);
      if (!owner) {
        throw new ArgloomError(`Argument "${def.name}" does not belong to this definition`, ErrorCode.DEFINITION_INVALID);
      }
      return owner;
    },
  });
}
