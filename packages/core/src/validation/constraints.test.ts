import { describe, it, expect } from "vitest";
import type { CommandHandler, ParseSources, UsageError } from "@argloom/sdk";
import { createCommand, type CommandBuilder } from "../definition/index.js";
import { matchArguments } from "../matcher/index.js";
import { resolveValues } from "../resolution/index.js";
import { validateConstraints } from "./constraints.js";

const noop: CommandHandler = () => undefined;

function check(builder: CommandBuilder, argv: string[], sources: ParseSources = {}): UsageError | undefined {
  const definition = builder.handler(noop).finalizeOrThrow();
  const outcome = matchArguments(definition, argv);
  if (outcome.kind !== "matched") throw new Error(`expected a match, got ${outcome.kind}`);
  return validateConstraints(definition, outcome.match.path, resolveValues(definition, outcome.match, sources));
}

describe("validateConstraints", () => {
  describe("required arguments", () => {
    it("reports a required argument missing from every source", () => {
      const error = check(createCommand("app").option("name", { required: true, env: "NAME" }), []);
      expect(error?.kind).toBe("MissingRequiredArgument");
      expect(error?.message).toBe("Missing required argument --name");
      expect(error?.arguments).toEqual(["name"]);
    });

    it("accepts a value from the environment", () => {
      expect(check(createCommand("app").option("name", { required: true, env: "NAME" }), [], { env: { NAME: "x" } })).toBeUndefined();
    });

    it("accepts a default", () => {
      expect(check(createCommand("app").option("name", { required: true, default: "anon" }), [])).toBeUndefined();
    });

    it("names positionals by their placeholder", () => {
      expect(check(createCommand("app").positional("file", { required: true }), [])?.message).toBe(
        "Missing required argument <file>",
      );
    });
  });

  describe("conflicts", () => {
    it("reports two conflicting arguments", () => {
      const error = check(createCommand("app").flag("a", { conflictsWith: ["b"] }).flag("b"), ["--a", "--b"]);
      expect(error?.kind).toBe("ArgumentConflict");
      expect(error?.message).toBe("Argument --a cannot be used with --b");
      expect(error?.arguments).toEqual(["a", "b"]);
    });

    it("treats a conflict declared on one side as symmetric", () => {
      const error = check(createCommand("app").flag("a").flag("b", { conflictsWith: ["a"] }), ["--b", "--a"]);
      expect(error?.message).toBe("Argument --a cannot be used with --b");
    });

    it("ignores defaults", () => {
      expect(
        check(createCommand("app").flag("a", { conflictsWith: ["b"] }).option("b", { default: "x" }), ["--a"]),
      ).toBeUndefined();
    });

    it("reports a group member conflicting with another argument", () => {
      const error = check(
        createCommand("app")
          .flag("json", { group: "output" })
          .flag("yaml", { group: "output" })
          .flag("quiet")
          .group({ id: "output", conflictsWith: ["quiet"] }),
        ["--yaml", "--quiet"],
      );
      expect(error?.message).toBe("Argument --yaml cannot be used with --quiet");
      expect(error?.group).toBe("output");
    });
  });

  describe("groups", () => {
    const transport = (): CommandBuilder =>
      createCommand("app")
        .flag("tls", { group: "transport" })
        .flag("plain", { group: "transport" })
        .group({ id: "transport", required: true });

    it("requires one member of a required group", () => {
      const error = check(transport(), []);
      expect(error?.kind).toBe("MissingRequiredArgument");
      expect(error?.message).toBe("One of the following arguments is required: --tls, --plain");
      expect(error?.group).toBe("transport");
    });

    it("allows a single member", () => {
      expect(check(transport(), ["--plain"])).toBeUndefined();
    });

    it("rejects several members of an exclusive group", () => {
      const error = check(transport(), ["--tls", "--plain"]);
      expect(error?.kind).toBe("ArgumentConflict");
      expect(error?.message).toBe("Only one of the following arguments may be used: --tls, --plain");
      expect(error?.arguments).toEqual(["tls", "plain"]);
    });

    it("allows several members when the group says so", () => {
      const builder = createCommand("app")
        .flag("tls", { group: "transport" })
        .flag("plain", { group: "transport" })
        .group({ id: "transport", multiple: true });
      expect(check(builder, ["--tls", "--plain"])).toBeUndefined();
    });
  });

  describe("dependencies", () => {
    const output = (): CommandBuilder =>
      createCommand("app").option("out", { requires: ["format"] }).option("format", { env: "FORMAT" });

    it("reports a missing dependency", () => {
      const error = check(output(), ["--out", "report.txt"]);
      expect(error?.kind).toBe("MissingRequiredArgument");
      expect(error?.message).toBe("Argument --out requires --format");
      expect(error?.arguments).toEqual(["out", "format"]);
    });

    it("accepts a dependency from the environment", () => {
      expect(check(output(), ["--out", "report.txt"], { env: { FORMAT: "csv" } })).toBeUndefined();
    });
  });

  it("reports missing required arguments before conflicts", () => {
    const builder = createCommand("app")
      .option("name", { required: true })
      .flag("a", { conflictsWith: ["b"] })
      .flag("b");
    expect(check(builder, ["--a", "--b"])?.kind).toBe("MissingRequiredArgument");
  });

  it("checks required arguments of every command on the path", () => {
    const builder = createCommand("app")
      .option("token", { required: true })
      .subcommand("deploy", (c) => c.handler(noop));
    const error = check(builder, ["deploy"]);
    expect(error?.message).toBe("Missing required argument --token");
    expect(error?.path).toEqual(["app", "deploy"]);
  });
});
