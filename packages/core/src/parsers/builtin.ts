/**
 * Built-in value parsers.
 *
 * Each factory turns a descriptor into a pure literal → value function.
 * Errors carry the literal and the expected shape; argument and source
 * context is attached later by the resolver.
 */

import { ValueError } from "@argloom/sdk";
import type { ParseResult, ValueKind, ValueParser } from "@argloom/sdk";

const SIGNED_INTEGER = /^[+-]?\d+$/;
const UNSIGNED_INTEGER = /^\+?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const TRUE_LITERALS = new Set(["true", "1", "yes", "on"]);
const FALSE_LITERALS = new Set(["false", "0", "no", "off"]);

export interface KeyValuePair<T = unknown> {
  key: string;
  value: T;
}

function ok<T>(value: T): ParseResult<T> {
  return { success: true, value };
}

function fail(kind: ValueError["kind"], literal: string, expected: string): ParseResult<never> {
  return { success: false, error: new ValueError(kind, literal, expected) };
}

function describeRange(base: string, min?: number, max?: number): string {
  if (min !== undefined && max !== undefined) return `${base} between ${min} and ${max}`;
  if (min !== undefined) return `${base} >= ${min}`;
  if (max !== undefined) return `${base} <= ${max}`;
  return base;
}

function numberParser(
  pattern: RegExp,
  base: string,
  integer: boolean,
  min?: number,
  max?: number,
): ValueParser<number> {
  return (literal) => {
    const text = literal.trim();
    if (!pattern.test(text)) return fail("InvalidValue", literal, describeRange(base, min, max));

    const value = Number(text);
    if (integer && !Number.isSafeInteger(value)) {
      return fail("OutOfRange", literal, describeRange(base, min ?? Number.MIN_SAFE_INTEGER, max ?? Number.MAX_SAFE_INTEGER));
    }
    if (!Number.isFinite(value)) return fail("OutOfRange", literal, describeRange(base, min, max));
    if ((min !== undefined && value < min) || (max !== undefined && value > max)) {
      return fail("OutOfRange", literal, describeRange(base, min, max));
    }
    return ok(value);
  };
}

/** Literal booleans, used for environment and config sources. */
export const parseBoolean: ValueParser<boolean> = (literal) => {
  const normalized = literal.trim().toLowerCase();
  if (TRUE_LITERALS.has(normalized)) return ok(true);
  if (FALSE_LITERALS.has(normalized)) return ok(false);
  return fail("InvalidValue", literal, "a boolean (true/false, yes/no, on/off, 1/0)");
};

export const parseString: ValueParser<string> = (literal) => ok(literal);

/** Syntactic check only; the path is never looked up on disk. */
export const parsePath: ValueParser<string> = (literal) => {
  if (literal.length === 0 || literal.includes("\0")) {
    return fail("InvalidValue", literal, "a file system path");
  }
  return ok(literal);
};

export function enumParser(values: readonly string[]): ValueParser<string> {
  const allowed = new Set(values);
  return (literal) =>
    allowed.has(literal) ? ok(literal) : fail("UnknownEnumVariant", literal, `one of ${values.join(", ")}`);
}

export function listParser<T>(separator: string, inner: ValueParser<T>): ValueParser<T[]> {
  return (literal) => {
    if (literal.length === 0) return ok([]);
    const items: T[] = [];
    for (const part of literal.split(separator)) {
      const result = inner(part);
      if (!result.success) return result;
      items.push(result.value);
    }
    return ok(items);
  };
}

export function keyValueParser<T>(inner: ValueParser<T>): ValueParser<KeyValuePair<T>> {
  return (literal) => {
    const eq = literal.indexOf("=");
    if (eq <= 0) return fail("InvalidValue", literal, "KEY=VALUE");
    const result = inner(literal.slice(eq + 1));
    if (!result.success) return result;
    return ok({ key: literal.slice(0, eq), value: result.value });
  };
}

/**
 * Parser for a built-in descriptor. `custom` kinds and nested kinds that
 * cannot be resolved go through `resolveNested`.
 */
export function builtinParser(
  kind: ValueKind,
  resolveNested: (kind: ValueKind) => ValueParser | undefined,
): ValueParser | undefined {
  switch (kind.type) {
    case "string":
      return parseString;
    case "int":
      return numberParser(SIGNED_INTEGER, "an integer", true, kind.min, kind.max);
    case "uint":
      return numberParser(UNSIGNED_INTEGER, "an unsigned integer", true, kind.min, kind.max);
    case "float":
      return numberParser(DECIMAL, "a number", false, kind.min, kind.max);
    case "bool":
      return parseBoolean;
    case "count":
      return numberParser(UNSIGNED_INTEGER, "an unsigned integer", true);
    case "path":
      return parsePath;
    case "enum":
      return enumParser(kind.values);
    case "list": {
      const inner = resolveNested(kind.of);
      return inner ? listParser(kind.separator, inner) : undefined;
    }
    case "keyValue": {
      const inner = kind.of ? resolveNested(kind.of) : parseString;
      return inner ? keyValueParser(inner) : undefined;
    }
    case "custom":
      return undefined;
  }
}
