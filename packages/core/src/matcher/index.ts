/**
 * Matcher — walks the token stream against the compiled command tree.
 *
 * The tokenizer is pulled lazily and asked about short flags of whatever
 * command is current, so `app -x sub -x` reads each `-x` in its own scope.
 * Subcommand switches are permanent. Help and version flags short-circuit
 * on the first match.
 */

import { UsageError } from "@argloom/sdk";
import type {
  ArgumentDef,
  CommandNode,
  DisplayRequest,
  LongFlagToken,
  MatchResult,
  PositionalToken,
  RawOccurrence,
  ShortFlagLookup,
  ShortFlagToken,
  Token,
} from "@argloom/sdk";
import { closestMatch, createLogger } from "@argloom/shared";
import { tokenize } from "../tokenizer/index.js";
import type { CompiledDefinition, CompiledNode } from "../definition/index.js";
import { displayName, isPresenceOnly, maxValues, minValues } from "../definition/index.js";

const logger = createLogger("Matcher");

export type MatchOutcome =
  | { readonly kind: "matched"; readonly match: MatchResult }
  | { readonly kind: "display"; readonly request: DisplayRequest };

interface PendingOccurrence {
  def: ArgumentDef;
  flag: string;
  values: string[];
}

interface PositionalSlot {
  def: ArgumentDef;
  values: string[];
}

function describeArity(def: ArgumentDef): string {
  const min = minValues(def.arity);
  const max = maxValues(def.arity);
  const plural = (n: number): string => (n === 1 ? "1 value" : `${n} values`);
  if (min === max) return plural(min);
  if (max === Number.POSITIVE_INFINITY) return `at least ${plural(min)}`;
  return `${min} to ${plural(max)}`;
}

/**
 * Match `argv` against `definition`. Throws UsageError on the first problem.
 */
export function matchArguments(definition: CompiledDefinition, argv: readonly string[]): MatchOutcome {
  return new MatchSession(definition).run(argv);
}

class MatchSession implements ShortFlagLookup {
  private current: CompiledNode;
  private readonly path: CommandNode[];
  private readonly occurrences = new Map<ArgumentDef, RawOccurrence[]>();
  private pending?: PendingOccurrence;
  private slot?: PositionalSlot;
  private cursor = 0;
  private trailing?: PositionalSlot;
  /** Tokens seen since the current command was entered. */
  private consumed = 0;

  constructor(definition: CompiledDefinition) {
    this.current = definition.rootNode;
    this.path = [definition.root];
  }

  describeShort(flag: string): "flag" | "value" | undefined {
    const def = this.current.shortFlags.get(flag);
    if (!def) return undefined;
    return isPresenceOnly(def) ? "flag" : "value";
  }

  run(argv: readonly string[]): MatchOutcome {
    const tokens = tokenize(argv, this);

    for (let next = tokens.next(); !next.done; next = tokens.next()) {
      const token = next.value;
      this.consumed++;

      if (this.trailing) {
        if (token.kind !== "terminator") this.trailing.values.push(token.raw);
        continue;
      }

      const display = this.accept(token, tokens);
      if (display) return { kind: "display", request: display };
    }

    if (this.consumed === 0 && this.current.argRequiredElseHelp) {
      return { kind: "display", request: { kind: "help", path: this.current.path, node: this.current.node } };
    }

    this.closePending();
    this.closeSlot();
    const trailing = this.trailing;
    if (trailing) {
      if (trailing.values.length < minValues(trailing.def.arity)) {
        this.arityError(trailing.def, displayName(trailing.def), trailing.values.length);
      }
      if (trailing.values.length > 0) this.record(trailing.def, { values: trailing.values });
    }

    return {
      kind: "matched",
      match: { source: "commandLine", path: [...this.path], occurrences: this.occurrences },
    };
  }

  // ─── Tokens ───

  private accept(token: Token, rest: Iterator<Token, void>): DisplayRequest | undefined {
    switch (token.kind) {
      case "terminator":
        this.closePending();
        return undefined;
      case "long":
        this.closePending();
        return this.acceptLong(token);
      case "short":
        this.closePending();
        return this.acceptShort(token);
      case "positional":
        return this.acceptPositional(token, rest);
    }
  }

  private acceptLong(token: LongFlagToken): DisplayRequest | undefined {
    const def = this.current.longFlags.get(token.name);
    if (!def) {
      const candidates = [...this.current.longFlags].filter(([, d]) => !d.hidden).map(([name]) => name);
      const suggestion = closestMatch(token.name, candidates);
      throw new UsageError("UnknownArgument", `Unexpected argument "${token.raw}"`, {
        path: this.current.path,
        suggestion: suggestion === undefined ? undefined : `--${suggestion}`,
      });
    }
    return this.startOccurrence(def, `--${token.name}`, token.value);
  }

  private acceptShort(token: ShortFlagToken): DisplayRequest | undefined {
    const last = token.flags.length - 1;
    for (let i = 0; i <= last; i++) {
      const flag = token.flags[i];
      const def = this.current.shortFlags.get(flag);
      if (!def) {
        const candidates = [...this.current.shortFlags].filter(([, d]) => !d.hidden).map(([name]) => name);
        const suggestion = closestMatch(flag, candidates);
        throw new UsageError("UnknownArgument", `Unexpected argument "-${flag}"${token.flags.length > 1 ? ` in "${token.raw}"` : ""}`, {
          path: this.current.path,
          suggestion: suggestion === undefined ? undefined : `-${suggestion}`,
        });
      }
      const display = this.startOccurrence(def, `-${flag}`, i === last ? token.value : undefined);
      if (display) return display;
    }
    return undefined;
  }

  private startOccurrence(def: ArgumentDef, flag: string, inline: string | undefined): DisplayRequest | undefined {
    if (def.action === "help" || def.action === "version") {
      logger.debug(`${def.action} requested`, { command: this.current.path.join(" ") });
      return { kind: def.action, path: this.current.path, node: this.current.node };
    }

    if (isPresenceOnly(def)) {
      if (inline !== undefined) {
        throw new UsageError("WrongArity", `Argument ${flag} takes no value but got "${inline}"`, {
          path: this.current.path,
          arguments: [def.name],
        });
      }
      this.record(def, { values: [], flag });
      return undefined;
    }

    if (inline !== undefined) {
      if (minValues(def.arity) > 1) this.arityError(def, flag, 1);
      this.record(def, { values: [inline], flag });
      return undefined;
    }

    this.pending = { def, flag, values: [] };
    return undefined;
  }

  private acceptPositional(token: PositionalToken, rest: Iterator<Token, void>): DisplayRequest | undefined {
    const pending = this.pending;
    if (pending && !token.afterTerminator) {
      pending.values.push(token.text);
      if (pending.values.length >= maxValues(pending.def.arity)) this.closePending();
      return undefined;
    }
    this.closePending();

    // Between positionals a known subcommand name always wins
    if (!token.afterTerminator && this.slot === undefined) {
      const child = this.current.children.get(token.text);
      if (child) {
        this.enter(child);
        return undefined;
      }
      if (token.text === "help" && this.current.helpSubcommand) return this.helpFor(rest);
    }

    this.fillPositional(token);
    return undefined;
  }

  private enter(child: CompiledNode): void {
    logger.debug(`Entering subcommand "${child.node.name}"`, { command: child.path.join(" ") });
    this.current = child;
    this.path.push(child.node);
    this.cursor = 0;
    this.slot = undefined;
    this.consumed = 0;
  }

  /** `app help a b` → help for `app a b`. */
  private helpFor(rest: Iterator<Token, void>): DisplayRequest {
    let target = this.current;
    for (let next = rest.next(); !next.done; next = rest.next()) {
      const token = next.value;
      if (token.kind !== "positional") continue;
      const child = target.children.get(token.text);
      if (!child) throw this.invalidSubcommand(target, token.text);
      target = child;
    }
    return { kind: "help", path: target.path, node: target.node };
  }

  private fillPositional(token: PositionalToken): void {
    if (this.slot === undefined) {
      const def = this.current.positionals[this.cursor];
      if (!def) {
        if (this.current.children.size > 0 && !token.afterTerminator && this.cursor === 0) {
          throw this.invalidSubcommand(this.current, token.text);
        }
        throw new UsageError("UnknownArgument", `Unexpected argument "${token.text}"`, { path: this.current.path });
      }
      this.slot = { def, values: [] };
    }

    const slot = this.slot;
    slot.values.push(token.text);
    if (slot.def.trailing) {
      this.trailing = slot;
      this.slot = undefined;
      return;
    }
    if (slot.values.length >= maxValues(slot.def.arity)) this.closeSlot();
  }

  private invalidSubcommand(node: CompiledNode, text: string): UsageError {
    const names = node.node.children.filter((c) => !c.hidden).flatMap((c) => [c.name, ...c.aliases]);
    return new UsageError("InvalidSubcommand", `Unrecognized subcommand "${text}"`, {
      path: node.path,
      suggestion: closestMatch(text, names),
    });
  }

  // ─── Occurrences ───

  private closePending(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = undefined;

    const { def, flag } = pending;
    let values = pending.values;
    if (values.length === 0 && def.missingValue !== undefined) values = [def.missingValue];
    if (values.length < minValues(def.arity)) this.arityError(def, flag, values.length);
    this.record(def, { values, flag });
  }

  private closeSlot(): void {
    const slot = this.slot;
    if (!slot) return;
    this.slot = undefined;
    this.cursor++;

    if (slot.values.length < minValues(slot.def.arity)) this.arityError(slot.def, displayName(slot.def), slot.values.length);
    this.record(slot.def, { values: slot.values });

    // Once the positionals before it are filled, a trailing positional takes everything
    const next = this.current.positionals[this.cursor];
    if (next?.trailing) this.trailing = { def: next, values: [] };
  }

  private record(def: ArgumentDef, occurrence: RawOccurrence): void {
    const list = this.occurrences.get(def);
    if (list) list.push(occurrence);
    else this.occurrences.set(def, [occurrence]);
  }

  private arityError(def: ArgumentDef, label: string, got: number): never {
    const message =
      got === 0 && minValues(def.arity) === 1
        ? `Argument ${label} expects a value`
        : `Argument ${label} expects ${describeArity(def)} but got ${got}`;
    throw new UsageError("WrongArity", message, { path: this.current.path, arguments: [def.name] });
  }
}
