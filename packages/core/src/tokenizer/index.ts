/**
 * Tokenizer — splits a raw argument vector into a lazy token stream.
 *
 * The stream is pulled one token at a time by the matcher. Short-flag
 * bundles are split with the help of a lookup that answers for the
 * matcher's *current* command, so a subcommand switch earlier in the
 * stream changes how later bundles are read.
 */

import type { PositionalToken, ShortFlagLookup, ShortFlagToken, Token } from "@argloom/sdk";

const NEGATIVE_NUMBER = /^-(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Lookup that knows no short flags: every bundle is a run of presence flags. */
export const NO_SHORT_FLAGS: ShortFlagLookup = {
  describeShort: () => undefined,
};

export function* tokenize(
  argv: readonly string[],
  lookup: ShortFlagLookup = NO_SHORT_FLAGS,
): Generator<Token, void, undefined> {
  let terminated = false;

  for (const raw of argv) {
    if (terminated) {
      yield positional(raw, true);
      continue;
    }

    if (raw === "--") {
      terminated = true;
      yield { kind: "terminator", raw };
      continue;
    }

    if (raw.startsWith("--")) {
      const body = raw.slice(2);
      const eq = body.indexOf("=");
      yield eq === -1
        ? { kind: "long", name: body, raw }
        : { kind: "long", name: body.slice(0, eq), value: body.slice(eq + 1), raw };
      continue;
    }

    if (raw.startsWith("-") && raw.length > 1) {
      // -5 is a value unless the command really declares -5
      if (NEGATIVE_NUMBER.test(raw) && lookup.describeShort(raw[1]) === undefined) {
        yield positional(raw, false);
        continue;
      }
      yield splitShortBundle(raw, lookup);
      continue;
    }

    yield positional(raw, false);
  }
}

function positional(raw: string, afterTerminator: boolean): PositionalToken {
  return { kind: "positional", text: raw, afterTerminator, raw };
}

/**
 * `-abc` → a, b, c. The first flag that takes a value ends the bundle and the
 * rest of the element (minus one leading "=") becomes its attached value.
 */
function splitShortBundle(raw: string, lookup: ShortFlagLookup): ShortFlagToken {
  const chars = [...raw.slice(1)];
  const flags: string[] = [];

  for (let i = 0; i < chars.length; i++) {
    const flag = chars[i];
    flags.push(flag);
    if (i + 1 < chars.length && lookup.describeShort(flag) === "value") {
      const rest = chars.slice(i + 1).join("");
      return { kind: "short", flags, value: rest.startsWith("=") ? rest.slice(1) : rest, raw };
    }
  }

  return { kind: "short", flags, raw };
}
