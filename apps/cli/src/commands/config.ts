/**
 * config get / config set — read and change the JSON config file.
 */

import { ExitCode } from "@argloom/sdk";
import type { ConfigMapping, ConfigValue } from "@argloom/sdk";
import { createCommand } from "@argloom/core";
import type { CommandBuilder } from "@argloom/core";
import { getConfigValue, parseConfigLiteral, saveConfigFile, setConfigValue } from "../utils/config-file.js";

/** The config file loaded for this invocation. */
export interface ConfigState {
  path?: string;
  config: ConfigMapping;
}

function formatValue(value: ConfigValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function configCommand(state: ConfigState): CommandBuilder {
  return createCommand("config")
    .description("Read or change the config file")
    .subcommand("get", (get) =>
      get
        .description("Print a value from the config file")
        .positional("key", { required: true, description: "Dotted key, e.g. serve.port" })
        .handler((values) => {
          const key = values.string("key") ?? "";
          const value = getConfigValue(state.config, key);
          if (value === undefined) {
            console.error(`Key "${key}" is not set`);
            return ExitCode.FAILURE;
          }
          console.log(formatValue(value));
          return ExitCode.SUCCESS;
        }),
    )
    .subcommand("set", (set) =>
      set
        .description("Write a value to the config file")
        .positional("key", { required: true, description: "Dotted key, e.g. serve.port" })
        .positional("value", { required: true, description: "JSON value, or plain text" })
        .handler(async (values, ctx) => {
          const { path } = state;
          if (path === undefined) {
            console.error("No config file given: pass --config <FILE> or set ARGLOOM_CONFIG");
            return ExitCode.USAGE;
          }
          const key = values.string("key") ?? "";
          const value = parseConfigLiteral(values.string("value") ?? "");

          state.config = setConfigValue(state.config, key, value);
          await saveConfigFile(path, state.config);
          ctx.logger.debug("Config file written", { path, key });
          console.log(`Set ${key} = ${JSON.stringify(value)}`);
          return ExitCode.SUCCESS;
        }),
    );
}
