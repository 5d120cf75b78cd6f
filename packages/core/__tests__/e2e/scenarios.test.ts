/**
 * End-to-end parsing scenarios through the engine facade.
 */

import { describe, it, expect, vi, afterEach } from "vitest";
import { UsageError } from "@argloom/sdk";
import type { CommandHandler, ParseOutcome, ParseSources } from "@argloom/sdk";
import { createCommand, createEngine } from "../../src/index.js";
import type { CompiledDefinition, Engine } from "../../src/index.js";

const noop: CommandHandler = () => undefined;

function engineFor(definition: CompiledDefinition): Engine {
  return createEngine(definition);
}

function matched(outcome: ParseOutcome): Extract<ParseOutcome, { kind: "matched" }> {
  if (outcome.kind !== "matched") {
    throw new Error(outcome.kind === "error" ? outcome.error.message : `unexpected ${outcome.kind}`);
  }
  return outcome;
}

function failed(outcome: ParseOutcome): Extract<ParseOutcome, { kind: "error" }> {
  if (outcome.kind !== "error") throw new Error(`expected an error, got ${outcome.kind}`);
  return outcome;
}

describe("Engine - E2E", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves the port from default, environment and command line", () => {
    const engine = engineFor(
      createCommand("app")
        .option("port", { kind: { type: "uint" }, default: "3000", env: "PORT" })
        .handler(noop)
        .finalizeOrThrow(),
    );

    expect(matched(engine.parse([])).values.get("port")).toBe(3000);
    expect(matched(engine.parse([], { env: { PORT: "9000" } })).values.get("port")).toBe(9000);
    expect(matched(engine.parse(["--port", "8080"], { env: { PORT: "9000" } })).values.get("port")).toBe(8080);
  });

  it("reports a required argument absent from every source", () => {
    const engine = engineFor(createCommand("app").option("name", { required: true }).handler(noop).finalizeOrThrow());
    const { error } = failed(engine.parse([]));

    expect(error.kind).toBe("MissingRequiredArgument");
    expect(error.message).toBe("Missing required argument --name");
  });

  it("rejects two arguments declared as conflicting", () => {
    const engine = engineFor(
      createCommand("app")
        .flag("a", { conflictsWith: ["b"] })
        .flag("b", { conflictsWith: ["a"] })
        .handler(noop)
        .finalizeOrThrow(),
    );
    const { error } = failed(engine.parse(["--a", "--b"]));

    expect(error.kind).toBe("ArgumentConflict");
    expect(error.message).toBe("Argument --a cannot be used with --b");
  });

  it("routes a nested subcommand with two positionals", () => {
    const engine = engineFor(
      createCommand("app")
        .subcommand("config", (config) =>
          config.subcommand("set", (set) => set.positional("key").positional("value").handler(noop)),
        )
        .finalizeOrThrow(),
    );
    const outcome = matched(engine.parse(["config", "set", "key1", "value1"]));

    expect(outcome.path).toEqual(["app", "config", "set"]);
    expect(outcome.values.get("key")).toBe("key1");
    expect(outcome.values.get("value")).toBe("value1");
  });

  it("suggests the closest long flag for a misspelling", () => {
    const engine = engineFor(createCommand("app").option("port").handler(noop).finalizeOrThrow());
    const { error } = failed(engine.parse(["--prot", "8080"]));

    expect(error.kind).toBe("UnknownArgument");
    expect(error instanceof UsageError ? error.suggestion : undefined).toBe("--port");
    expect(error.message).toBe('Unexpected argument "--prot" (did you mean "--port"?)');
  });
});

describe("Properties - E2E", () => {
  const definition = createCommand("app")
    .option("host", { default: "localhost", env: "HOST" })
    .option("port", { kind: { type: "uint" }, default: "3000", env: "PORT" })
    .option("tag", { repeatable: true })
    .flag("debug")
    .count("verbose", { short: "v" })
    .subcommand("serve", (c) => c.option("workers", { kind: { type: "uint", min: 1 } }).handler(noop))
    .handler(noop)
    .finalizeOrThrow();
  const engine = engineFor(definition);

  it("an empty argument vector resolves every argument to its default or absent value", () => {
    expect(matched(engine.parse([])).values.toObject()).toEqual({
      host: "localhost",
      port: 3000,
      tag: [],
      debug: false,
      verbose: 0,
    });
  });

  it("the command line always beats the environment and the default", () => {
    const sources: ParseSources = { env: { HOST: "env.example", PORT: "9000" } };
    const values = matched(engine.parse(["--host", "cli.example", "--port", "1"], sources)).values;

    expect(values.get("host")).toBe("cli.example");
    expect(values.get("port")).toBe(1);
    expect(values.source("host")).toBe("commandLine");
  });

  it("parsing the same input twice gives identical results", () => {
    const argv = ["-vv", "--tag", "a", "serve", "--workers", "4"];
    const sources: ParseSources = { env: { PORT: "9000" }, config: { serve: { workers: 2 } } };
    const first = matched(engine.parse(argv, sources));
    const second = matched(engine.parse(argv, sources));

    expect(second.path).toEqual(first.path);
    expect(second.values.toObject()).toEqual(first.values.toObject());
    expect(first.values.toObject()).toEqual({
      workers: 4,
      host: "localhost",
      port: 9000,
      tag: ["a"],
      debug: false,
      verbose: 2,
    });
  });

  it("reports value errors with their source", () => {
    const { error } = failed(engine.parse(["serve"], { config: { serve: { workers: 0 } } }));
    expect(error.kind).toBe("OutOfRange");
    expect(error.message).toBe('Value "0" is out of range for --workers (from config file): expected an unsigned integer >= 1');
  });
});

describe("Engine.run - E2E", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  function buildEngine(handler: CommandHandler): Engine {
    return engineFor(
      createCommand("app")
        .version("2.1.0")
        .subcommand("deploy", (c) => c.option("target", { required: true }).handler(handler))
        .subcommand("config", (c) => c.subcommand("get", (g) => g.positional("key").handler(noop)))
        .finalizeOrThrow(),
    );
  }

  it("returns the handler's exit code", async () => {
    const engine = buildEngine((values) => (values.string("target") === "prod" ? 7 : 0));
    await expect(engine.run(["deploy", "--target", "prod"])).resolves.toEqual({
      kind: "completed",
      path: ["app", "deploy"],
      exitCode: 7,
    });
  });

  it("exits with 0 for help and version", async () => {
    const engine = buildEngine(noop);
    const outcome = await engine.run(["--version"]);

    expect(outcome.exitCode).toBe(0);
    expect(outcome.kind === "display" ? outcome.request.kind : undefined).toBe("version");
  });

  it("exits with 2 for usage errors", async () => {
    const engine = buildEngine(noop);

    const missing = await engine.run(["deploy"]);
    expect(missing.exitCode).toBe(2);
    expect(missing.kind === "error" ? missing.error.kind : undefined).toBe("MissingRequiredArgument");

    const noSubcommand = await engine.run(["config"]);
    expect(noSubcommand.exitCode).toBe(2);
    expect(noSubcommand.kind === "error" ? noSubcommand.error.message : undefined).toBe(
      'Command "app config" requires a subcommand: get',
    );
  });

  it("exits with 1 when the handler fails", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    const engine = buildEngine(() => {
      throw new Error("connection refused");
    });
    const outcome = await engine.run(["deploy", "--target", "prod"]);

    expect(outcome.kind).toBe("failed");
    expect(outcome.exitCode).toBe(1);
    expect(outcome.kind === "failed" ? outcome.error.message : undefined).toBe(
      'Command "app deploy" failed: connection refused',
    );
  });
});
