/**
 * Name-addressed view over the resolved values of one parse.
 */

import type { ArgumentDef, CommandNode, ResolvedValue, ResolvedValues, ValueSource } from "@argloom/sdk";

export class ResolvedValueSet implements ResolvedValues {
  private readonly byName = new Map<string, ArgumentDef>();

  constructor(
    path: readonly CommandNode[],
    private readonly values: ReadonlyMap<ArgumentDef, ResolvedValue>,
  ) {
    // Leaf first, then ancestors: the first declaration of a name wins
    for (const node of [...path].reverse()) {
      for (const def of node.arguments) {
        if (values.has(def) && !this.byName.has(def.name)) this.byName.set(def.name, def);
      }
    }
  }

  /** Resolved values keyed by definition. */
  entries(): ReadonlyMap<ArgumentDef, ResolvedValue> {
    return this.values;
  }

  entry(name: string): ResolvedValue | undefined {
    const def = this.byName.get(name);
    return def ? this.values.get(def) : undefined;
  }

  get(name: string): unknown {
    return this.entry(name)?.value;
  }

  has(name: string): boolean {
    return this.entry(name)?.source !== undefined;
  }

  source(name: string): ValueSource | undefined {
    return this.entry(name)?.source;
  }

  string(name: string): string | undefined {
    const value = this.get(name);
    return typeof value === "string" ? value : undefined;
  }

  number(name: string): number | undefined {
    const value = this.get(name);
    return typeof value === "number" ? value : undefined;
  }

  /** Booleans as-is; counters are true when above zero. */
  boolean(name: string): boolean {
    const value = this.get(name);
    if (typeof value === "boolean") return value;
    return typeof value === "number" && value > 0;
  }

  /** String elements of a multi-valued argument, or the single string value as a list. */
  strings(name: string): string[] {
    const value = this.get(name);
    if (Array.isArray(value)) return value.filter((item): item is string => typeof item === "string");
    return typeof value === "string" ? [value] : [];
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, def] of this.byName) result[name] = this.values.get(def)?.value;
    return result;
  }
}
