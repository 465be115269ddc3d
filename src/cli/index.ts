import { Command } from "commander";

import type { AppContext } from "../app/context.js";
import { DEFAULT_CONFIG_FILE, loadAppContext } from "../app/config/load-app-context.js";

import { artifactCommand } from "./artifact.js";
import { buildCommand } from "./build.js";
import {
  collectRepeatable,
  parseBuildState,
  parseNonNegativeInt,
  parsePositiveInt,
  parsePositiveNumber,
} from "./command-helpers.js";
import { listCommand } from "./list.js";
import { logsCommand } from "./logs.js";
import { pruneCommand } from "./prune.js";
import { statusCommand } from "./status.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = (command: Command): AppContext => {
    const globals = command.optsWithGlobals<GlobalOptions>();
    return loadAppContext({ explicitConfigPath: globals.config });
  };

  program
    .name("fwbuild")
    .description("Queue and run custom firmware builds on a pool of reusable workspaces")
    .version("0.1.0")
    .option("--config <path>", `Project config path (default: ./${DEFAULT_CONFIG_FILE})`)
    .option("--debug", "Show error details and stack traces", false)
    // Global options go before the subcommand, so `build --version` stays the build's own option.
    .enablePositionalOptions();

  program
    .command("build")
    .description("Build firmware for a target and wait for the result")
    .requiredOption("--vehicle <name>", "Vehicle type, e.g. copter")
    .requiredOption("--board <name>", "Board name, e.g. MatekH743")
    .requiredOption("--version <name>", "Release label from the feature catalog")
    .option("--feature <id>", "Enable a feature (repeatable)", collectRepeatable, [])
    .option("--output <path>", "Copy the primary artifact here on success")
    .option("--failure-tail <n>", "Lines of output to show on failure", parsePositiveInt)
    .action(async (opts, command: Command) => {
      await buildCommand(resolveContext(command), {
        vehicle: opts.vehicle,
        board: opts.board,
        version: opts.version,
        features: opts.feature,
        output: opts.output,
        failureTail: opts.failureTail,
      });
    });

  program
    .command("status")
    .description("Show a build's state and progress")
    .argument("<build-id>", "Build id")
    .option("--json", "Emit JSON output", false)
    .action(async (buildId: string, opts, command: Command) => {
      await statusCommand(resolveContext(command), buildId, { json: opts.json });
    });

  program
    .command("list")
    .description("List recorded builds, newest first")
    .option("--vehicle <name>", "Only builds for this vehicle")
    .option("--board <name>", "Only builds for this board")
    .option("--state <state>", "Only builds in this state", parseBuildState)
    .option("--limit <n>", "Maximum number of builds", parsePositiveInt)
    .option("--offset <n>", "Skip this many builds", parseNonNegativeInt)
    .option("--json", "Emit JSON output", false)
    .action(async (opts, command: Command) => {
      await listCommand(resolveContext(command), {
        vehicle: opts.vehicle,
        board: opts.board,
        state: opts.state,
        limit: opts.limit,
        offset: opts.offset,
        json: opts.json,
      });
    });

  program
    .command("logs")
    .description("Print a build's toolchain output")
    .argument("<build-id>", "Build id")
    .option("--tail <n>", "Only the last n lines", parsePositiveInt)
    .action(async (buildId: string, opts, command: Command) => {
      await logsCommand(resolveContext(command), buildId, { tail: opts.tail });
    });

  program
    .command("artifact")
    .description("List a successful build's artifacts or copy one out")
    .argument("<build-id>", "Build id")
    .option("--name <file>", "Artifact file name (default: the primary artifact)")
    .option("--output <path>", "Write the artifact to this path")
    .action(async (buildId: string, opts, command: Command) => {
      await artifactCommand(resolveContext(command), buildId, { name: opts.name, output: opts.output });
    });

  program
    .command("prune")
    .description("Delete finished builds and their logs and artifacts")
    .option("--older-than-days <n>", "Age cutoff (default: retention_days from config)", parsePositiveNumber)
    .action(async (opts, command: Command) => {
      await pruneCommand(resolveContext(command), { olderThanDays: opts.olderThanDays });
    });

  return program;
}
