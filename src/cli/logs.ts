import type { AppContext } from "../app/context.js";

import { normalizeCommandError, openReadOnlyStores, requireBuild } from "./command-helpers.js";

export async function logsCommand(
  ctx: AppContext,
  buildId: string,
  opts: { tail?: number } = {},
): Promise<void> {
  try {
    const { store, artifacts } = await openReadOnlyStores(ctx);
    const build = requireBuild(store, buildId);

    const log = await artifacts.getLog(build.id, { tail: opts.tail });
    if (log === null) {
      console.log(`No log recorded for build ${build.id} (state ${build.state}).`);
      return;
    }

    process.stdout.write(log);
  } catch (error) {
    throw normalizeCommandError(error, "Logs command failed.");
  }
}
