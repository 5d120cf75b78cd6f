/**
 * Router — looks up the handler for a matched command path and invokes it.
 *
 * Routes come from the table built at finalize(). A command with
 * subcommands but no handler of its own cannot be dispatched to directly.
 */

import { ExitCode, HandlerError, UsageError } from "@argloom/sdk";
import type { CommandHandler, CommandNode, ExecutionContext, ResolvedValues } from "@argloom/sdk";
import { createLogger, generateId } from "@argloom/shared";
import type { CompiledDefinition } from "../definition/index.js";

const logger = createLogger("Router");

export interface Route {
  readonly path: readonly string[];
  readonly node: CommandNode;
  readonly handler: CommandHandler;
}

export interface DispatchOptions {
  /** Raw argument vector handed to the handler */
  argv: readonly string[];
  /** Defaults to process.cwd() */
  cwd?: string;
}

export interface Router {
  /** Route for a matched path. Throws UsageError (MissingSubcommand) if there is none. */
  resolve(path: readonly CommandNode[]): Route;
  /** Invoke the route's handler. Resolves to its exit code; a throwing handler becomes HandlerError. */
  dispatch(route: Route, values: ResolvedValues, options: DispatchOptions): Promise<number>;
}

export function createRouter(definition: CompiledDefinition): Router {
  return {
    resolve(path: readonly CommandNode[]): Route {
      const names = path.map((node) => node.name);
      const compiled = definition.routes.get(names.join(" "));
      if (!compiled) {
        throw new UsageError("InvalidSubcommand", `Unknown command "${names.join(" ")}"`, { path: names });
      }

      if (!compiled.handler) {
        const available = compiled.node.children.filter((c) => !c.hidden).map((c) => c.name);
        throw new UsageError(
          "MissingSubcommand",
          `Command "${compiled.path.join(" ")}" requires a subcommand: ${available.join(", ")}`,
          { path: compiled.path },
        );
      }

      return { path: compiled.path, node: compiled.node, handler: compiled.handler };
    },

    async dispatch(route: Route, values: ResolvedValues, options: DispatchOptions): Promise<number> {
      const invocationId = generateId();
      const command = route.path.join(" ");
      const handlerLogger = logger.child(command);
      handlerLogger.setContext({ invocationId, command });

      const context: ExecutionContext = {
        cwd: options.cwd ?? process.cwd(),
        argv: options.argv,
        path: route.path,
        definition,
        invocationId,
        logger: handlerLogger,
      };

      logger.debug(`Dispatching "${command}"`, { invocationId });
      const stop = logger.time(`handler "${command}"`);
      try {
        const result = await route.handler(values, context);
        return typeof result === "number" ? result : ExitCode.SUCCESS;
      } catch (err) {
        throw new HandlerError(route.path, err);
      } finally {
        stop();
      }
    },
  };
}
