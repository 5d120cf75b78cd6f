/**
 * JSON config file loading, dotted-key access and saving.
 */

import { readFile, writeFile } from "node:fs/promises";
import { ArgloomError } from "@argloom/sdk";
import type { ConfigMapping, ConfigValue } from "@argloom/sdk";
import { ConfigMappingSchema, ConfigValueSchema, validateInput } from "@argloom/shared";
import type { ValidationResult } from "@argloom/shared";

export interface LoadConfigOptions {
  /** Treat a missing file as an empty mapping */
  allowMissing?: boolean;
}

export class ConfigKeyError extends ArgloomError {
  constructor(message: string) {
    super(message, "CONFIG_KEY_INVALID");
    this.name = "ConfigKeyError";
  }
}

function isMapping(value: ConfigValue | undefined): value is ConfigMapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

function reasonOf(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Read and validate a JSON config file. */
export async function loadConfigFile(
  path: string,
  options: LoadConfigOptions = {},
): Promise<ValidationResult<ConfigMapping>> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (options.allowMissing && isMissingFile(err)) return { success: true, data: {} };
    return { success: false, error: `Cannot read config file ${path}: ${reasonOf(err)}`, issues: [] };
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (err) {
    return { success: false, error: `Config file ${path} is not valid JSON: ${reasonOf(err)}`, issues: [] };
  }

  const result = validateInput(ConfigMappingSchema, data);
  if (!result.success) {
    return { success: false, error: `Config file ${path} is invalid: ${result.error}`, issues: result.issues };
  }
  return result;
}

export async function saveConfigFile(path: string, config: ConfigMapping): Promise<void> {
  await writeFile(path, `${JSON.stringify(config, null, 2)}\n`, "utf-8");
}

/** Look up a dotted key such as `serve.port`. */
export function getConfigValue(config: ConfigMapping, key: string): ConfigValue | undefined {
  let current: ConfigValue | undefined = config;
  for (const part of key.split(".")) {
    if (!isMapping(current)) return undefined;
    current = current[part];
  }
  return current;
}

/** Copy of `config` with a dotted key set; intermediate objects are created. */
export function setConfigValue(config: ConfigMapping, key: string, value: ConfigValue): ConfigMapping {
  const [head, ...rest] = key.split(".");
  if (head === undefined || head.length === 0) throw new ConfigKeyError(`Invalid config key "${key}"`);
  if (rest.length === 0) return { ...config, [head]: value };

  const existing = config[head];
  if (existing !== undefined && existing !== null && !isMapping(existing)) {
    throw new ConfigKeyError(`Cannot set "${key}": "${head}" is not an object`);
  }
  const nested = isMapping(existing) ? existing : {};
  return { ...config, [head]: setConfigValue(nested, rest.join("."), value) };
}

/**
 * Interpret a command-line literal as a config value: JSON when it parses,
 * the raw text otherwise.
 */
export function parseConfigLiteral(text: string): ConfigValue {
  let decoded: unknown;
  try {
    decoded = JSON.parse(text);
  } catch {
    return text;
  }
  const result = validateInput(ConfigValueSchema, decoded);
  return result.success ? result.data : text;
}
