/**
 * exec — echoes the command line it was given, quoted for a POSIX shell.
 */

import { ExitCode } from "@argloom/sdk";
import { createCommand } from "@argloom/core";
import type { CommandBuilder } from "@argloom/core";

const SAFE_WORD = /^[\w@%+=:,./-]+$/;

export function shellQuote(word: string): string {
  return SAFE_WORD.test(word) ? word : `'${word.replace(/'/g, `'\\''`)}'`;
}

export function execCommand(): CommandBuilder {
  return createCommand("exec")
    .description("Print the command line that would be run")
    .positional("command", { required: true, description: "Program to run" })
    .positional("args", { trailing: true, description: "Arguments passed through unchanged" })
    .handler((values) => {
      const words = [values.string("command") ?? "", ...values.strings("args")];
      console.log(words.map(shellQuote).join(" "));
      return ExitCode.SUCCESS;
    });
}
