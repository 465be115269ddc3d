import path from "node:path";

import { execa } from "execa";
import fse from "fs-extra";

import { GitError } from "../core/errors.js";
import { ensureDir } from "../core/utils.js";

import { resolveExecaErrorOutput } from "./git.js";

// Always recreates destDir; --no-hardlinks keeps workspaces independent of the mirror's object store.
export async function cloneRepo(opts: { sourceRepo: string; destDir: string }): Promise<void> {
  await ensureDir(path.dirname(opts.destDir));
  await fse.remove(opts.destDir);

  const args = ["clone", "--no-hardlinks", "--quiet", opts.sourceRepo, opts.destDir];
  try {
    await execa("git", args, { stdio: "pipe" });
  } catch (err) {
    throw buildGitErrorFromCommand(args, undefined, err);
  }
}

export function buildGitErrorFromCommand(
  args: string[],
  cwd: string | undefined,
  err: unknown,
): GitError {
  const { stdout, stderr, message } = resolveExecaErrorOutput(err);
  const detail = stderr || message || "Unknown git error.";
  const location = cwd ? ` (cwd=${cwd})` : "";
  return new GitError(`git ${args.join(" ")} failed${location}: ${detail}`, { stdout, stderr });
}
