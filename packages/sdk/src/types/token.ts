/**
 * Token stream produced from a raw argument vector.
 *
 * Every token keeps the argv element it came from in `raw`; one element
 * always yields exactly one token.
 */

export interface LongFlagToken {
  readonly kind: "long";
  readonly name: string;
  /** Text after the first `=`, if any */
  readonly value?: string;
  readonly raw: string;
}

export interface ShortFlagToken {
  readonly kind: "short";
  /** Bundled short flags in order (`-abc` → a, b, c) */
  readonly flags: readonly string[];
  /** Attached value of the last flag (`-p8080`) */
  readonly value?: string;
  readonly raw: string;
}

export interface PositionalToken {
  readonly kind: "positional";
  readonly text: string;
  /** Seen after `--`: never a flag, never a subcommand */
  readonly afterTerminator: boolean;
  readonly raw: string;
}

export interface TerminatorToken {
  readonly kind: "terminator";
  readonly raw: string;
}

export type Token = LongFlagToken | ShortFlagToken | PositionalToken | TerminatorToken;

/**
 * What the tokenizer needs to know about a short flag of the current command:
 * "flag" for a presence flag, "value" for one taking values, undefined if unknown.
 */
export type ShortFlagShape = "flag" | "value" | undefined;

export interface ShortFlagLookup {
  describeShort(flag: string): ShortFlagShape;
}
