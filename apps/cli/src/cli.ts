/**
 * argloom-demo — command tree and entry point.
 *
 * Parsing happens twice: the first pass resolves `--config` from the
 * command line and the environment, the file is then read and validated,
 * and the second pass merges it in before dispatching.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { ExitCode } from "@argloom/sdk";
import type { EnvironmentSnapshot, RunOutcome } from "@argloom/sdk";
import { createCommand, createEngine } from "@argloom/core";
import type { CompiledDefinition } from "@argloom/core";
import { createLogger, EnvironmentSchema, validateInput } from "@argloom/shared";
import { configCommand, type ConfigState } from "./commands/config.js";
import { execCommand } from "./commands/exec.js";
import { serveCommand } from "./commands/serve.js";
import { loadConfigFile } from "./utils/config-file.js";
import { LOG_LEVELS, logLevelFor } from "./utils/logging.js";
import { renderError, renderHelp, renderVersion } from "./utils/render.js";

const __dirname = dirname(fileURLToPath(import.meta.url));

export const PROGRAM_NAME = "argloom-demo";

function readVersion(): string {
  const pkgPath = resolve(__dirname, "../package.json");
  try {
    const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return pkg.version;
    }
  } catch (err) {
    createLogger("argloom-demo").debug("Failed to read version information", { pkgPath, error: String(err) });
  }
  return "0.0.0";
}

export function buildDefinition(state: ConfigState): CompiledDefinition {
  return createCommand(PROGRAM_NAME)
    .description("Example tool built on the argloom command engine")
    .version(readVersion())
    .argRequiredElseHelp()
    .option("config", {
      short: "c",
      kind: { type: "path" },
      env: "ARGLOOM_CONFIG",
      configKey: "configFile",
      global: true,
      valueName: "FILE",
      description: "Read settings from a JSON file",
    })
    .count("verbose", { short: "v", global: true, description: "Log more, may be repeated" })
    .option("log-level", {
      kind: { type: "enum", values: LOG_LEVELS },
      default: "warn",
      env: "ARGLOOM_LOG_LEVEL",
      configKey: "logLevel",
      global: true,
      valueName: "LEVEL",
      description: "Lowest level of diagnostic output",
    })
    .addSubcommand(serveCommand())
    .addSubcommand(configCommand(state))
    .addSubcommand(execCommand())
    .finalizeOrThrow();
}

export interface CliOptions {
  env?: EnvironmentSnapshot;
  cwd?: string;
}

/** Print what an outcome has to show and return its exit code. */
function report(definition: CompiledDefinition, outcome: RunOutcome): number {
  switch (outcome.kind) {
    case "completed":
      break;
    case "display":
      console.log(
        outcome.request.kind === "help"
          ? renderHelp(definition, outcome.request)
          : renderVersion(definition, outcome.request),
      );
      break;
    case "error":
      console.error(renderError(definition, outcome.error));
      break;
    case "failed":
      console.error(`error: ${outcome.error.message}`);
      break;
  }
  return outcome.exitCode;
}

export async function runCli(argv: readonly string[], options: CliOptions = {}): Promise<number> {
  const checked = validateInput(EnvironmentSchema, options.env ?? process.env);
  if (!checked.success) {
    console.error(`error: Invalid environment: ${checked.error}`);
    return ExitCode.USAGE;
  }
  const env = checked.data;
  const cwd = options.cwd ?? process.cwd();
  const state: ConfigState = { config: {} };
  const definition = buildDefinition(state);
  const engine = createEngine(definition, { cwd });

  const first = engine.parse(argv, { env });
  switch (first.kind) {
    case "display":
      return report(definition, { kind: "display", request: first.request, exitCode: ExitCode.SUCCESS });
    case "error":
      return report(definition, { kind: "error", error: first.error, exitCode: ExitCode.USAGE });
    case "matched":
      break;
  }

  const logger = createLogger(PROGRAM_NAME, { level: logLevelFor(first.values) });
  const configFile = first.values.string("config");
  if (configFile !== undefined) {
    const path = resolve(cwd, configFile);
    // `config set` may create the file.
    const creating = first.path.join(" ") === `${PROGRAM_NAME} config set`;
    const loaded = await loadConfigFile(path, { allowMissing: creating });
    if (!loaded.success) {
      console.error(`error: ${loaded.error}`);
      return ExitCode.USAGE;
    }
    logger.info(`Loaded config from ${path}`);
    state.path = path;
    state.config = loaded.data;
  }

  return report(definition, await engine.run(argv, { env, config: state.config }));
}
