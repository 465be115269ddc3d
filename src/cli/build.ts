/*
Purpose: run one firmware build in-process: start the orchestrator, submit, wait for a
terminal state and report it.
Assumptions: PENDING builds left by an earlier process are picked up too; the command only
waits for its own build. Ctrl-C cancels the build, a second Ctrl-C is ignored.
*/

import path from "node:path";

import fse from "fs-extra";

import type { AppContext } from "../app/context.js";
import { openBuildEngine, type BuildEngine, type OpenBuildEngineOptions } from "../app/engine.js";
import type { Build } from "../core/build.js";
import { formatErrorMessage } from "../core/error-format.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { normalizeCommandError } from "./command-helpers.js";
import { formatBuildSummary } from "./status.js";

export type BuildCommandOptions = {
  vehicle: string;
  board: string;
  version: string;
  features?: string[];
  output?: string;
  // Lines of build output echoed when the build does not succeed.
  failureTail?: number;
};

const DEFAULT_FAILURE_TAIL = 20;

export async function buildCommand(
  ctx: AppContext,
  opts: BuildCommandOptions,
  engineOptions: OpenBuildEngineOptions = {},
): Promise<Build> {
  let engine: BuildEngine | null = null;
  let detachSignal = (): void => undefined;

  try {
    engine = openBuildEngine(ctx, engineOptions);
    const { orchestrator } = engine;
    await orchestrator.start();

    const { buildId, deduplicated } = await orchestrator.submit({
      vehicle: opts.vehicle,
      board: opts.board,
      version: opts.version,
      features: opts.features ?? [],
    });
    console.log(deduplicated ? `Joined identical build ${buildId}` : `Submitted build ${buildId}`);

    detachSignal = attachCancelOnSigint(engine, buildId);

    const build = await orchestrator.waitForTerminal(buildId);
    if (!build) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.build,
        title: "Build vanished.",
        message: `Build ${buildId} is no longer recorded.`,
      });
    }

    for (const line of formatBuildSummary(build, build.state === "SUCCESS" ? 100 : 0)) {
      console.log(line);
    }

    if (build.state === "SUCCESS") {
      if (opts.output) await writePrimaryArtifact(engine, build.id, opts.output);
      return build;
    }

    const tail = await orchestrator.getLog(build.id, { tail: opts.failureTail ?? DEFAULT_FAILURE_TAIL });
    if (tail) {
      console.log("");
      console.log("Last lines of build output:");
      process.stdout.write(tail);
    }
    process.exitCode = 1;
    return build;
  } catch (error) {
    throw normalizeCommandError(error, "Build command failed.");
  } finally {
    detachSignal();
    if (engine) await engine.close();
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function attachCancelOnSigint(engine: BuildEngine, buildId: string): () => void {
  let cancelling = false;

  const onSigint = (): void => {
    if (cancelling) return;
    cancelling = true;
    console.error(`Cancelling build ${buildId}...`);
    engine.orchestrator.cancel(buildId).then(
      (result) => {
        if (result.status !== "ok") console.error(`Cancel: ${result.status}`);
      },
      (err: unknown) => {
        console.error(`Cancel failed: ${formatErrorMessage(err)}`);
      },
    );
  };

  process.on("SIGINT", onSigint);
  return () => {
    process.off("SIGINT", onSigint);
  };
}

async function writePrimaryArtifact(engine: BuildEngine, buildId: string, output: string): Promise<void> {
  const data = await engine.orchestrator.getArtifact(buildId);
  if (!data) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.build,
      title: "Artifact missing.",
      message: `Build ${buildId} succeeded but its primary artifact could not be read.`,
    });
  }

  const target = path.resolve(output);
  await fse.outputFile(target, data);
  console.log(`Wrote ${data.length} bytes to ${target}`);
}
