/**
 * External value sources handed to the engine by the caller.
 */

/** JSON-like value from an already-parsed configuration file. */
export type ConfigValue =
  | string
  | number
  | boolean
  | null
  | readonly ConfigValue[]
  | { readonly [key: string]: ConfigValue };

export interface ConfigMapping {
  readonly [key: string]: ConfigValue;
}

/** Read-only environment snapshot, compatible with `process.env`. */
export type EnvironmentSnapshot = Readonly<Record<string, string | undefined>>;

export interface ParseSources {
  env?: EnvironmentSnapshot;
  config?: ConfigMapping;
}
