/**
 * Engine — the parse → resolve → validate → route pipeline over one
 * finalized definition.
 *
 * `parse` is synchronous and never throws for bad input: usage and value
 * problems come back as an `error` outcome, help and version as `display`.
 * `run` parses, then dispatches to the matched handler.
 */

import { ExitCode, HandlerError, UsageError, ValueError } from "@argloom/sdk";
import type { ParseOutcome, ParseSources, RunOutcome } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import type { CompiledDefinition } from "../definition/index.js";
import { matchArguments } from "../matcher/index.js";
import { ResolvedValueSet, resolveValues } from "../resolution/index.js";
import { createRouter } from "../routing/index.js";
import { validateConstraints } from "../validation/index.js";

const logger = createLogger("Engine");

export interface EngineOptions {
  /** Working directory reported to handlers; process.cwd() by default */
  cwd?: string;
}

export interface Engine {
  readonly definition: CompiledDefinition;
  parse(argv: readonly string[], sources?: ParseSources): ParseOutcome;
  run(argv: readonly string[], sources?: ParseSources): Promise<RunOutcome>;
}

export function createEngine(definition: CompiledDefinition, options: EngineOptions = {}): Engine {
  const router = createRouter(definition);

  function parse(argv: readonly string[], sources: ParseSources = {}): ParseOutcome {
    const stop = logger.time("parse");
    try {
      const matched = matchArguments(definition, argv);
      if (matched.kind === "display") return { kind: "display", request: matched.request };

      const { match } = matched;
      const route = router.resolve(match.path);
      const resolved = resolveValues(definition, match, sources);
      const violation = validateConstraints(definition, match.path, resolved);
      if (violation) return { kind: "error", error: violation };

      return {
        kind: "matched",
        path: route.path,
        nodes: match.path,
        values: new ResolvedValueSet(match.path, resolved),
        match,
      };
    } catch (err) {
      if (err instanceof UsageError || err instanceof ValueError) {
        logger.debug(`Parse failed: ${err.message}`, { code: err.code });
        return { kind: "error", error: err };
      }
      throw err;
    } finally {
      stop();
    }
  }

  async function run(argv: readonly string[], sources: ParseSources = {}): Promise<RunOutcome> {
    const outcome = parse(argv, sources);
    switch (outcome.kind) {
      case "display":
        return { kind: "display", request: outcome.request, exitCode: ExitCode.SUCCESS };
      case "error":
        return { kind: "error", error: outcome.error, exitCode: ExitCode.USAGE };
      case "matched":
        break;
    }

    const route = router.resolve(outcome.nodes);
    try {
      const exitCode = await router.dispatch(route, outcome.values, { argv, cwd: options.cwd });
      return { kind: "completed", path: route.path, exitCode };
    } catch (err) {
      if (err instanceof HandlerError) {
        logger.error(err.message);
        return { kind: "failed", error: err, exitCode: ExitCode.FAILURE };
      }
      throw err;
    }
  }

  return { definition, parse, run };
}
