import type { AppContext } from "../app/context.js";
import { openBuildEngine, type OpenBuildEngineOptions } from "../app/engine.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { normalizeCommandError } from "./command-helpers.js";

const DAY_MS = 24 * 60 * 60 * 1000;

// Takes the home lock, so it refuses to run beside an active orchestrator.
export async function pruneCommand(
  ctx: AppContext,
  opts: { olderThanDays?: number; now?: number },
  engineOptions: OpenBuildEngineOptions = {},
): Promise<void> {
  try {
    const days = opts.olderThanDays ?? ctx.config.retention_days;
    if (days === undefined) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.config,
        title: "No retention period.",
        message: "Pass --older-than-days or set retention_days in the project config.",
      });
    }

    const engine = openBuildEngine(ctx, engineOptions);
    try {
      await engine.store.load();
      const { removed } = await engine.orchestrator.prune({ olderThanMs: days * DAY_MS, now: opts.now });
      const builds = `${removed.length} build${removed.length === 1 ? "" : "s"}`;
      console.log(`Removed ${builds} finished more than ${days} day${days === 1 ? "" : "s"} ago.`);
    } finally {
      await engine.close();
    }
  } catch (error) {
    throw normalizeCommandError(error, "Prune command failed.");
  }
}
