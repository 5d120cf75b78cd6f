import { describe, it, expect } from "vitest";
import type { ShortFlagLookup } from "@argloom/sdk";
import { tokenize } from "./index.js";

const lookup: ShortFlagLookup = {
  describeShort: (flag) => {
    if (flag === "p" || flag === "o") return "value";
    if (flag === "v" || flag === "x") return "flag";
    return undefined;
  },
};

describe("tokenize", () => {
  it("reads long flags with and without inline values", () => {
    expect([...tokenize(["--verbose", "--port=8080", "--name="])]).toEqual([
      { kind: "long", name: "verbose", raw: "--verbose" },
      { kind: "long", name: "port", value: "8080", raw: "--port=8080" },
      { kind: "long", name: "name", value: "", raw: "--name=" },
    ]);
  });

  it("splits only on the first equals sign", () => {
    expect([...tokenize(["--define=a=b"])]).toEqual([
      { kind: "long", name: "define", value: "a=b", raw: "--define=a=b" },
    ]);
  });

  it("treats single-character long flags as long flags", () => {
    expect([...tokenize(["--a"])]).toEqual([{ kind: "long", name: "a", raw: "--a" }]);
  });

  it("bundles short presence flags", () => {
    expect([...tokenize(["-vx"], lookup)]).toEqual([
      { kind: "short", flags: ["v", "x"], raw: "-vx" },
    ]);
  });

  it("takes the rest of the element as an attached value", () => {
    expect([...tokenize(["-p8080", "-vo=out.txt"], lookup)]).toEqual([
      { kind: "short", flags: ["p"], value: "8080", raw: "-p8080" },
      { kind: "short", flags: ["v", "o"], value: "out.txt", raw: "-vo=out.txt" },
    ]);
  });

  it("leaves a value-taking flag at the end of a bundle without a value", () => {
    expect([...tokenize(["-vp"], lookup)]).toEqual([
      { kind: "short", flags: ["v", "p"], raw: "-vp" },
    ]);
  });

  it("turns -- into a terminator and everything after it into positionals", () => {
    expect([...tokenize(["a", "--", "--port", "-v", "--"])]).toEqual([
      { kind: "positional", text: "a", afterTerminator: false, raw: "a" },
      { kind: "terminator", raw: "--" },
      { kind: "positional", text: "--port", afterTerminator: true, raw: "--port" },
      { kind: "positional", text: "-v", afterTerminator: true, raw: "-v" },
      { kind: "positional", text: "--", afterTerminator: true, raw: "--" },
    ]);
  });

  it("keeps empty strings and a lone dash as positionals", () => {
    expect([...tokenize(["", "-"])]).toEqual([
      { kind: "positional", text: "", afterTerminator: false, raw: "" },
      { kind: "positional", text: "-", afterTerminator: false, raw: "-" },
    ]);
  });

  it("reads negative numbers as values when no digit flag exists", () => {
    expect([...tokenize(["-5", "-1.5"], lookup)]).toEqual([
      { kind: "positional", text: "-5", afterTerminator: false, raw: "-5" },
      { kind: "positional", text: "-1.5", afterTerminator: false, raw: "-1.5" },
    ]);
  });

  it("reads -5 as a flag when the command declares -5", () => {
    const digits: ShortFlagLookup = { describeShort: (flag) => (flag === "5" ? "flag" : undefined) };
    expect([...tokenize(["-5"], digits)]).toEqual([{ kind: "short", flags: ["5"], raw: "-5" }]);
  });

  it("asks the lookup lazily, token by token", () => {
    let takesValue = false;
    const dynamic: ShortFlagLookup = { describeShort: () => (takesValue ? "value" : "flag") };
    const stream = tokenize(["-ab", "-ab"], dynamic);

    expect(stream.next().value).toEqual({ kind: "short", flags: ["a", "b"], raw: "-ab" });
    takesValue = true;
    expect(stream.next().value).toEqual({ kind: "short", flags: ["a"], value: "b", raw: "-ab" });
  });

  it("does no semantic validation", () => {
    expect([...tokenize(["--definitely-unknown", "-q"])]).toEqual([
      { kind: "long", name: "definitely-unknown", raw: "--definitely-unknown" },
      { kind: "short", flags: ["q"], raw: "-q" },
    ]);
  });
});
