/**
 * Value parser types.
 */

import type { ValueError } from "../errors/base.js";

export type ParseResult<T = unknown> =
  | { success: true; value: T }
  | { success: false; error: ValueError };

/** Pure conversion from one literal to a typed value. */
export type ValueParser<T = unknown> = (literal: string) => ParseResult<T>;
