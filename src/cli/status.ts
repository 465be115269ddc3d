import type { AppContext } from "../app/context.js";
import type { Build } from "../core/build.js";
import { computeProgress } from "../core/progress.js";

import { formatTimestamp, normalizeCommandError, openReadOnlyStores, requireBuild } from "./command-helpers.js";

export async function statusCommand(
  ctx: AppContext,
  buildId: string,
  opts: { json?: boolean } = {},
): Promise<void> {
  try {
    const { store, artifacts } = await openReadOnlyStores(ctx);
    const build = requireBuild(store, buildId);

    const log = build.state === "RUNNING" ? await artifacts.getLog(build.id) : null;
    const progress = computeProgress(build.state, log);

    if (opts.json) {
      console.log(JSON.stringify({ ...build, progress }, null, 2));
      return;
    }

    for (const line of formatBuildSummary(build, progress)) {
      console.log(line);
    }
  } catch (error) {
    throw normalizeCommandError(error, "Status command failed.");
  }
}

export function formatBuildSummary(build: Build, progress: number): string[] {
  const { request } = build;
  const lines = [
    `Build: ${build.id}`,
    `State: ${build.state}${build.state === "RUNNING" ? ` (${progress}%)` : ""}`,
    `Target: ${request.vehicle} ${request.board} ${request.version}`,
    `Features: ${request.features.length > 0 ? request.features.join(", ") : "(catalog defaults)"}`,
    `Created: ${formatTimestamp(build.created_at)}`,
    `Started: ${formatTimestamp(build.started_at)}`,
    `Finished: ${formatTimestamp(build.finished_at)}`,
  ];

  if (build.workspace_id !== undefined) lines.push(`Workspace: ${build.workspace_id}`);
  if (build.commit) lines.push(`Commit: ${build.commit}`);
  if (build.error) lines.push(`Error: ${build.error.kind}: ${build.error.message}`);
  if (build.artifact_ref) lines.push(`Artifact: ${build.artifact_ref}`);
  if (build.log_ref) lines.push(`Log: ${build.log_ref}`);

  return lines;
}
