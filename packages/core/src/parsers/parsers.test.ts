import { describe, it, expect } from "vitest";
import { ValueError } from "@argloom/sdk";
import type { ParseResult, ValueKind, ValueParser } from "@argloom/sdk";
import { createParserRegistry } from "./registry.js";

function parserFor(kind: ValueKind): ValueParser {
  const parser = createParserRegistry().resolve(kind);
  if (!parser) throw new Error(`no parser for ${kind.type}`);
  return parser;
}

function valueOf(result: ParseResult): unknown {
  if (!result.success) throw result.error;
  return result.value;
}

function errorOf(result: ParseResult): ValueError {
  if (result.success) throw new Error(`expected failure, got ${String(result.value)}`);
  return result.error;
}

describe("built-in parsers", () => {
  describe("string", () => {
    it("accepts any literal, including the empty string", () => {
      const parse = parserFor({ type: "string" });
      expect(valueOf(parse(""))).toBe("");
      expect(valueOf(parse("héllo wörld"))).toBe("héllo wörld");
    });
  });

  describe("int / uint", () => {
    it("parses signed integers", () => {
      const parse = parserFor({ type: "int" });
      expect(valueOf(parse("-42"))).toBe(-42);
      expect(valueOf(parse("+7"))).toBe(7);
    });

    it("rejects fractions and garbage with InvalidValue", () => {
      const error = errorOf(parserFor({ type: "int" })("4.5"));
      expect(error.kind).toBe("InvalidValue");
      expect(error.literal).toBe("4.5");
      expect(error.expected).toBe("an integer");
    });

    it("rejects negative unsigned integers", () => {
      const error = errorOf(parserFor({ type: "uint" })("-1"));
      expect(error.kind).toBe("InvalidValue");
      expect(error.expected).toBe("an unsigned integer");
    });

    it("enforces a closed range", () => {
      const parse = parserFor({ type: "uint", min: 1, max: 65535 });
      expect(valueOf(parse("1"))).toBe(1);
      expect(valueOf(parse("65535"))).toBe(65535);

      const error = errorOf(parse("70000"));
      expect(error.kind).toBe("OutOfRange");
      expect(error.expected).toBe("an unsigned integer between 1 and 65535");
    });

    it("describes half-open ranges", () => {
      expect(errorOf(parserFor({ type: "int", min: 10 })("3")).expected).toBe("an integer >= 10");
      expect(errorOf(parserFor({ type: "int", max: 10 })("30")).expected).toBe("an integer <= 10");
    });

    it("reports unsafe integers as out of range", () => {
      expect(errorOf(parserFor({ type: "int" })("9007199254740993")).kind).toBe("OutOfRange");
    });
  });

  describe("float", () => {
    it("parses decimals and exponents", () => {
      const parse = parserFor({ type: "float" });
      expect(valueOf(parse("1.5"))).toBe(1.5);
      expect(valueOf(parse("-.25"))).toBe(-0.25);
      expect(valueOf(parse("2e3"))).toBe(2000);
    });

    it("rejects NaN spellings", () => {
      expect(errorOf(parserFor({ type: "float" })("NaN")).expected).toBe("a number");
    });

    it("checks bounds", () => {
      expect(errorOf(parserFor({ type: "float", min: 0, max: 1 })("1.01")).kind).toBe("OutOfRange");
    });
  });

  describe("bool", () => {
    it("accepts common literal spellings", () => {
      const parse = parserFor({ type: "bool" });
      expect(valueOf(parse("true"))).toBe(true);
      expect(valueOf(parse("YES"))).toBe(true);
      expect(valueOf(parse("on"))).toBe(true);
      expect(valueOf(parse("0"))).toBe(false);
      expect(valueOf(parse("off"))).toBe(false);
    });

    it("rejects anything else", () => {
      expect(errorOf(parserFor({ type: "bool" })("maybe")).kind).toBe("InvalidValue");
    });
  });

  describe("path", () => {
    it("checks syntax only", () => {
      const parse = parserFor({ type: "path" });
      expect(valueOf(parse("./does/not/exist.json"))).toBe("./does/not/exist.json");
      expect(errorOf(parse("")).expected).toBe("a file system path");
    });
  });

  describe("enum", () => {
    it("matches case-sensitively", () => {
      const parse = parserFor({ type: "enum", values: ["debug", "info"] });
      expect(valueOf(parse("info"))).toBe("info");

      const error = errorOf(parse("INFO"));
      expect(error.kind).toBe("UnknownEnumVariant");
      expect(error.expected).toBe("one of debug, info");
    });
  });

  describe("list", () => {
    it("splits and parses each element", () => {
      const parse = parserFor({ type: "list", separator: ",", of: { type: "uint" } });
      expect(valueOf(parse("1,2,3"))).toEqual([1, 2, 3]);
      expect(valueOf(parse(""))).toEqual([]);
    });

    it("reports the offending element", () => {
      const error = errorOf(parserFor({ type: "list", separator: ",", of: { type: "uint" } })("1,x,3"));
      expect(error.literal).toBe("x");
    });
  });

  describe("keyValue", () => {
    it("splits once on the first equals sign", () => {
      const parse = parserFor({ type: "keyValue" });
      expect(valueOf(parse("url=http://h/?a=b"))).toEqual({ key: "url", value: "http://h/?a=b" });
      expect(valueOf(parse("empty="))).toEqual({ key: "empty", value: "" });
    });

    it("parses the value with an inner kind", () => {
      expect(valueOf(parserFor({ type: "keyValue", of: { type: "int" } })("retries=3"))).toEqual({
        key: "retries",
        value: 3,
      });
    });

    it("requires a key", () => {
      const parse = parserFor({ type: "keyValue" });
      expect(errorOf(parse("novalue")).expected).toBe("KEY=VALUE");
      expect(errorOf(parse("=x")).expected).toBe("KEY=VALUE");
    });
  });
});

describe("ParserRegistry", () => {
  it("resolves custom kinds registered by the application", () => {
    const registry = createParserRegistry();
    registry.register<{ width: number; height: number }>("size", (literal) => {
      const match = /^(\d+)x(\d+)$/.exec(literal);
      if (!match) return { success: false, error: new ValueError("InvalidValue", literal, "WIDTHxHEIGHT") };
      return { success: true, value: { width: Number(match[1]), height: Number(match[2]) } };
    });

    const parse = registry.resolve({ type: "custom", name: "size" });
    expect(parse?.("1920x1080")).toEqual({ success: true, value: { width: 1920, height: 1080 } });
    expect(registry.customKinds()).toEqual(["size"]);
  });

  it("resolves custom kinds nested in lists", () => {
    const registry = createParserRegistry();
    registry.register("upper", (literal) => ({ success: true, value: literal.toUpperCase() }));
    const parse = registry.resolve({ type: "list", separator: ":", of: { type: "custom", name: "upper" } });

    expect(parse?.("a:b")).toEqual({ success: true, value: ["A", "B"] });
  });

  it("reports unknown custom kinds as unresolvable", () => {
    const registry = createParserRegistry();
    expect(registry.has({ type: "custom", name: "missing" })).toBe(false);
    expect(registry.has({ type: "list", separator: ",", of: { type: "custom", name: "missing" } })).toBe(false);
    expect(registry.has({ type: "uint" })).toBe(true);
  });

  it("rejects duplicate and empty names", () => {
    const registry = createParserRegistry();
    registry.register("color", (literal) => ({ success: true, value: literal }));

    expect(() => registry.register("color", (literal) => ({ success: true, value: literal }))).toThrow(
      'Value kind "color" is already registered',
    );
    expect(() => registry.register(" ", (literal) => ({ success: true, value: literal }))).toThrow("non-empty");
  });
});
