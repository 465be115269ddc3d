#!/usr/bin/env node
import { CommanderError } from "commander";

import { cliExitCode, renderCliError } from "./cli/error-format.js";
import { buildCli } from "./cli/index.js";

// Commander reports these through exceptions once exitOverride() is set.
const QUIET_EXITS = new Set(["commander.helpDisplayed", "commander.help", "commander.version"]);

export async function main(argv: string[]): Promise<void> {
  const program = buildCli();
  program.exitOverride();
  program.configureOutput({
    // Usage errors are rendered below with the rest.
    outputError: () => undefined,
  });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (!QUIET_EXITS.has(error.code)) console.error(renderCliError(error, { debug: isDebug(argv) }));
      process.exitCode = error.exitCode;
      return;
    }

    console.error(renderCliError(error, { debug: isDebug(argv) }));
    process.exitCode = cliExitCode(error);
  }
}

// Scanned from argv so that --debug applies even when option parsing failed.
function isDebug(argv: string[]): boolean {
  const end = argv.indexOf("--");
  const args = end >= 0 ? argv.slice(0, end) : argv;
  return args.lastIndexOf("--debug") > args.lastIndexOf("--no-debug");
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void main(process.argv);
}
