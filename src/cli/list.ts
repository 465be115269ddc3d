import type { AppContext } from "../app/context.js";
import type { BuildFilter } from "../core/status-store.js";

import { formatTimestamp, normalizeCommandError, openReadOnlyStores, renderTable } from "./command-helpers.js";

export async function listCommand(ctx: AppContext, opts: BuildFilter & { json?: boolean }): Promise<void> {
  try {
    const { store } = await openReadOnlyStores(ctx);
    const { json, ...filter } = opts;
    const page = store.list(filter);

    if (json) {
      console.log(JSON.stringify(page, null, 2));
      return;
    }

    if (page.total === 0) {
      console.log("No builds recorded.");
      return;
    }

    const rows = page.builds.map((build) => [
      build.id,
      build.state,
      build.request.vehicle,
      build.request.board,
      build.request.version,
      formatTimestamp(build.created_at),
      build.error?.kind ?? "",
    ]);
    for (const line of renderTable(["Build", "State", "Vehicle", "Board", "Version", "Created", "Error"], rows)) {
      console.log(line);
    }

    const first = page.builds.length > 0 ? page.offset + 1 : 0;
    console.log("");
    console.log(`Showing ${first}-${page.offset + page.builds.length} of ${page.total} builds.`);
  } catch (error) {
    throw normalizeCommandError(error, "List command failed.");
  }
}
