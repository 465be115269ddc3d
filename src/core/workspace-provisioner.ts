import path from "node:path";

import fse from "fs-extra";

import { buildGitErrorFromCommand, cloneRepo } from "../git/clone.js";
import { extractGitErrorOutput, getRemoteUrl, git, resolveCommit, tryGit } from "../git/git.js";

import { BuildConfigError, CheckoutError, GitError, OrchestratorError } from "./errors.js";
import type { SlotPaths } from "./paths.js";
import { isGitRepo, pathExists } from "./utils.js";
import type { WorkspaceProvisioner } from "./workspace-pool.js";

// git stderr fragments that mean the checkout itself is damaged, not just the request.
const CORRUPTION_PATTERNS = [
  /not a git repository/i,
  /corrupt/i,
  /bad object/i,
  /loose object .* is empty/i,
  /index file (smaller than expected|corrupt)/i,
  /unable to read tree/i,
  /object file .* is empty/i,
  /packfile .* cannot be accessed/i,
];

const MIRROR_REFSPECS = ["+refs/heads/*:refs/remotes/origin/*", "+refs/tags/*:refs/tags/*"];

export class GitWorkspaceProvisioner implements WorkspaceProvisioner {
  constructor(public readonly mirror: string) {}

  async prepare(slot: SlotPaths): Promise<void> {
    if (await this.isUsableClone(slot.srcDir)) return;
    await this.reclone(slot);
  }

  async reclone(slot: SlotPaths): Promise<void> {
    await cloneRepo({ sourceRepo: this.mirror, destDir: slot.srcDir });
  }

  async checkout(slot: SlotPaths, ref: string): Promise<string> {
    const cwd = slot.srcDir;
    if (!isGitRepo(cwd)) {
      throw new CheckoutError("CorruptWorkspace", `Workspace slot ${slot.slotId} has no git checkout at ${cwd}.`);
    }

    await runCheckoutStep(cwd, ["reset", "--hard", "--quiet"]);
    await runCheckoutStep(cwd, ["clean", "-ffdxq"]);
    // Workspaces only ever fetch from the local mirror.
    await runCheckoutStep(cwd, ["fetch", "--quiet", "--prune", "origin", ...MIRROR_REFSPECS]);

    const commit = await resolveCommit(cwd, ref);
    if (!commit) {
      throw new BuildConfigError("UnresolvableRef", `Ref ${ref} does not resolve to a commit in ${this.mirror}.`);
    }

    await runCheckoutStep(cwd, ["checkout", "--force", "--detach", "--quiet", commit]);
    await runCheckoutStep(cwd, ["reset", "--hard", "--quiet", commit]);
    await runCheckoutStep(cwd, ["clean", "-ffdxq"]);

    if (await pathExists(path.join(cwd, ".gitmodules"))) {
      await runCheckoutStep(cwd, ["submodule", "update", "--init", "--recursive", "--force"]);
    }

    return commit;
  }

  private async isUsableClone(srcDir: string): Promise<boolean> {
    if (!isGitRepo(srcDir)) return false;

    const inside = await tryGit(srcDir, ["rev-parse", "--is-inside-work-tree"]);
    if (inside.exitCode !== 0) return false;

    const originUrl = await getRemoteUrl(srcDir);
    const [expected, actual] = await Promise.all([
      normalizeLocalPath(this.mirror),
      normalizeLocalPath(originUrl),
    ]);
    if (expected && actual) return expected === actual;
    return originUrl === this.mirror;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function runCheckoutStep(cwd: string, args: string[]): Promise<void> {
  try {
    await git(cwd, args);
  } catch (err) {
    throw classifyGitFailure(err, args, cwd);
  }
}

export function classifyGitFailure(err: unknown, args: string[], cwd: string): OrchestratorError {
  const gitError = err instanceof GitError ? err : buildGitErrorFromCommand(args, cwd, err);
  const { stderr } = extractGitErrorOutput(gitError);
  const detail = stderr || gitError.message;

  if (CORRUPTION_PATTERNS.some((pattern) => pattern.test(detail))) {
    return new CheckoutError("CorruptWorkspace", gitError.message, gitError);
  }
  return new CheckoutError("GitFailure", gitError.message, gitError);
}

async function normalizeLocalPath(input: string | null): Promise<string | null> {
  if (!input) return null;

  const urlLike = input.startsWith("file://") ? new URL(input) : null;
  const candidate = urlLike ? urlLike.pathname : input;

  if (
    candidate.startsWith("/") ||
    candidate.startsWith(".") ||
    /^[A-Za-z]:/.test(candidate) ||
    candidate.startsWith("~")
  ) {
    const resolved = path.resolve(candidate.replace(/^~(?=$|\/)/, process.env.HOME ?? "~"));
    try {
      return await fse.realpath(resolved);
    } catch {
      return resolved;
    }
  }

  return null;
}
