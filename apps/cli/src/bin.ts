#!/usr/bin/env node

/**
 * argloom-demo entry point.
 *
 *   argloom-demo serve [--port <PORT>] [--host <HOST>] [--tls | --plain]
 *   argloom-demo config get <key>
 *   argloom-demo config set <key> <value>
 *   argloom-demo exec <command> [args]...
 */

import { runCli } from "./cli.js";

runCli(process.argv.slice(2))
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((err) => {
    console.error("Fatal error:", err);
    process.exit(1);
  });
