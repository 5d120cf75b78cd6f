/**
 * ParserRegistry — maps value-kind descriptors to parsers.
 *
 * Built-in kinds resolve directly; `{ type: "custom", name }` resolves to
 * whatever the application registered under `name`. Nested kinds (list
 * elements, key=value values) may themselves be custom.
 */

import { ArgloomError, ErrorCode } from "@argloom/sdk";
import type { ValueKind, ValueParser } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import { builtinParser } from "./builtin.js";

const logger = createLogger("ParserRegistry");

export interface ParserRegistry {
  /** Register a custom kind. Names are unique. */
  register<T>(name: string, parser: ValueParser<T>): void;
  has(kind: ValueKind): boolean;
  resolve(kind: ValueKind): ValueParser | undefined;
  customKinds(): string[];
}

export function createParserRegistry(): ParserRegistry {
  const custom = new Map<string, ValueParser>();

  function resolve(kind: ValueKind): ValueParser | undefined {
    if (kind.type === "custom") return custom.get(kind.name);
    return builtinParser(kind, resolve);
  }

  return {
    register<T>(name: string, parser: ValueParser<T>): void {
      if (name.trim() === "") {
        throw new ArgloomError("Value kind name must be a non-empty string", ErrorCode.DEFINITION_INVALID);
      }
      if (custom.has(name)) {
        throw new ArgloomError(`Value kind "${name}" is already registered`, ErrorCode.DEFINITION_INVALID);
      }
      logger.debug(`Registering value kind: ${name}`);
      custom.set(name, parser);
    },

    has(kind: ValueKind): boolean {
      return resolve(kind) !== undefined;
    },

    resolve,

    customKinds(): string[] {
      return [...custom.keys()];
    },
  };
}
