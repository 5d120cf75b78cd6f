/**
 * Constraint validator — checks required, conflict, group and dependency
 * rules against the merged values of the matched path.
 *
 * Only the first violation is reported, in a fixed order: missing
 * required arguments, argument conflicts, group conflicts, group rules,
 * then dependencies. Within each pass, root to leaf in declaration order.
 *
 * Defaults satisfy `required` but never count as "present" for the
 * other rules.
 */

import { UsageError } from "@argloom/sdk";
import type { ArgumentDef, CommandNode, ResolvedValue } from "@argloom/sdk";
import type { CompiledDefinition, CompiledGroup } from "../definition/index.js";
import { displayName } from "../definition/index.js";

type ValueMap = ReadonlyMap<ArgumentDef, ResolvedValue>;

function isSupplied(values: ValueMap, def: ArgumentDef): boolean {
  return values.get(def)?.source !== undefined;
}

function isPresent(values: ValueMap, def: ArgumentDef): boolean {
  const source = values.get(def)?.source;
  return source !== undefined && source !== "default";
}

function listNames(defs: readonly ArgumentDef[]): string {
  return defs.map(displayName).join(", ");
}

export function validateConstraints(
  definition: CompiledDefinition,
  path: readonly CommandNode[],
  values: ValueMap,
): UsageError | undefined {
  const leaf = path[path.length - 1] ?? definition.root;
  const commandPath = definition.pathOf(leaf);
  const declared = path.flatMap((node) => node.arguments.filter((def) => values.has(def)));
  const groups: CompiledGroup[] = path.flatMap((node) => [...definition.compiled(node).groups]);

  for (const def of declared) {
    if (def.required && !isSupplied(values, def)) {
      return new UsageError("MissingRequiredArgument", `Missing required argument ${displayName(def)}`, {
        path: commandPath,
        arguments: [def.name],
      });
    }
  }

  for (const def of declared) {
    if (!isPresent(values, def)) continue;
    for (const other of definition.conflictsOf(def)) {
      if (isPresent(values, other)) {
        return new UsageError("ArgumentConflict", `Argument ${displayName(def)} cannot be used with ${displayName(other)}`, {
          path: commandPath,
          arguments: [def.name, other.name],
        });
      }
    }
  }

  for (const { group, members, conflicts } of groups) {
    const member = members.find((m) => isPresent(values, m));
    const other = conflicts.find((c) => isPresent(values, c));
    if (member && other) {
      return new UsageError("ArgumentConflict", `Argument ${displayName(member)} cannot be used with ${displayName(other)}`, {
        path: commandPath,
        arguments: [member.name, other.name],
        group: group.id,
      });
    }
  }

  for (const { group, members } of groups) {
    if (group.required && !members.some((m) => isSupplied(values, m))) {
      return new UsageError(
        "MissingRequiredArgument",
        `One of the following arguments is required: ${listNames(members)}`,
        { path: commandPath, arguments: members.map((m) => m.name), group: group.id },
      );
    }
    const present = members.filter((m) => isPresent(values, m));
    if (!group.multiple && present.length > 1) {
      return new UsageError("ArgumentConflict", `Only one of the following arguments may be used: ${listNames(present)}`, {
        path: commandPath,
        arguments: present.map((m) => m.name),
        group: group.id,
      });
    }
  }

  for (const def of declared) {
    if (!isPresent(values, def)) continue;
    const missing = definition.requirementsOf(def).find((needed) => !isPresent(values, needed));
    if (missing) {
      return new UsageError("MissingRequiredArgument", `Argument ${displayName(def)} requires ${displayName(missing)}`, {
        path: commandPath,
        arguments: [def.name, missing.name],
      });
    }
  }

  return undefined;
}
