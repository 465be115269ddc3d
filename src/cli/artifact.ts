import path from "node:path";

import fse from "fs-extra";

import type { AppContext } from "../app/context.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { normalizeCommandError, openReadOnlyStores, requireBuild } from "./command-helpers.js";

export type ArtifactCommandOptions = {
  name?: string;
  output?: string;
};

// Lists stored artifacts, or copies one out when --output is given.
export async function artifactCommand(
  ctx: AppContext,
  buildId: string,
  opts: ArtifactCommandOptions = {},
): Promise<void> {
  try {
    const { store, artifacts } = await openReadOnlyStores(ctx);
    const build = requireBuild(store, buildId);

    if (build.state !== "SUCCESS") {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.build,
        title: "No artifact available.",
        message: `Build ${build.id} is ${build.state}; artifacts are only kept for successful builds.`,
        hint: `Run \`fwbuild logs ${build.id}\` to see what happened.`,
      });
    }

    const names = await artifacts.listArtifacts(build.id);
    if (!opts.output) {
      names.forEach((name, index) => console.log(index === 0 ? `${name} (primary)` : name));
      return;
    }

    const data = await artifacts.getArtifact(build.id, opts.name);
    if (!data) {
      throw new UserFacingError({
        code: USER_FACING_ERROR_CODES.build,
        title: "Artifact not found.",
        message: `Build ${build.id} has no artifact named ${opts.name ?? "(primary)"}.`,
        hint: names.length > 0 ? `Stored artifacts: ${names.join(", ")}` : undefined,
      });
    }

    const output = path.resolve(opts.output);
    await fse.outputFile(output, data);
    console.log(`Wrote ${data.length} bytes to ${output}`);
  } catch (error) {
    throw normalizeCommandError(error, "Artifact command failed.");
  }
}
