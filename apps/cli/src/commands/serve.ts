/**
 * serve — prints the server settings as resolved from the command line,
 * the environment, the config file and the defaults.
 */

import { ExitCode } from "@argloom/sdk";
import type { CommandHandler, ResolvedValues, ValueSource } from "@argloom/sdk";
import { createCommand } from "@argloom/core";
import type { CommandBuilder } from "@argloom/core";
import { createCliLogger } from "../utils/logging.js";

const SOURCE_LABELS: Record<ValueSource, string> = {
  commandLine: "command line",
  environment: "environment",
  configFile: "config file",
  default: "default",
};

function setting(values: ResolvedValues, name: string): string {
  const entry = values.entry(name);
  const origin = entry?.source ? SOURCE_LABELS[entry.source] : "unset";
  return `  ${name}: ${String(entry?.value)} (${origin})`;
}

export const serve: CommandHandler = (values) => {
  const logger = createCliLogger(values, "serve");
  const scheme = values.boolean("tls") ? "https" : "http";
  const workers = values.number("workers") ?? 1;

  console.log(`Serving ${scheme}://${values.string("host")}:${values.number("port")} with ${workers} worker(s)`);
  for (const name of ["port", "host", "workers"]) {
    console.log(setting(values, name));
  }

  const tags = values.entry("tag");
  if (tags && values.strings("tag").length > 0) {
    const origins = tags.sources.map((source) => SOURCE_LABELS[source]).join(", ");
    console.log(`  tags: ${values.strings("tag").join(", ")} (${origins})`);
  }

  const cert = values.string("cert");
  if (cert !== undefined) console.log(`  cert: ${cert}`);

  logger.debug("Resolved serve settings", values.toObject());
  return ExitCode.SUCCESS;
};

export function serveCommand(): CommandBuilder {
  return createCommand("serve")
    .description("Print the server settings resolved from every source")
    .option("port", {
      short: "p",
      kind: { type: "uint", min: 1, max: 65535 },
      default: "3000",
      env: "PORT",
      description: "Port to listen on",
    })
    .option("host", { default: "127.0.0.1", env: "HOST", description: "Interface to bind" })
    .option("workers", {
      short: "w",
      kind: { type: "uint", min: 1 },
      default: "1",
      valueName: "N",
      description: "Number of worker processes",
    })
    .option("tag", {
      short: "t",
      repeatable: true,
      accumulation: "append",
      description: "Label for the server, may be repeated",
    })
    .flag("tls", { group: "transport", description: "Serve over TLS" })
    .flag("plain", { group: "transport", description: "Serve plain HTTP" })
    .group({ id: "transport" })
    .option("cert", {
      kind: { type: "path" },
      requires: ["tls"],
      valueName: "FILE",
      description: "Certificate used with --tls",
    })
    .handler(serve);
}
