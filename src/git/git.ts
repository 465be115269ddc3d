import { execa, type Options } from "execa";

import { GitError } from "../core/errors.js";

export type GitOutput = { stdout: string; stderr: string; exitCode: number };

export async function git(cwd: string, args: string[], opts: Options = {}): Promise<GitOutput> {
  try {
    const res = await execa("git", args, {
      cwd,
      stdio: "pipe",
      env: process.env,
      ...opts,
    });
    return {
      stdout: toText(res.stdout),
      stderr: toText(res.stderr),
      exitCode: res.exitCode ?? -1,
    };
  } catch (err) {
    const { stdout, stderr, message } = resolveExecaErrorOutput(err);
    const detail = stderr || message;
    throw new GitError(`git ${args.join(" ")} failed (cwd=${cwd}): ${detail}`, { stdout, stderr });
  }
}

// Same as git() but reports a non-zero exit instead of throwing.
export async function tryGit(cwd: string, args: string[]): Promise<GitOutput> {
  const res = await execa("git", args, { cwd, stdio: "pipe", reject: false });
  return {
    stdout: toText(res.stdout),
    stderr: toText(res.stderr),
    exitCode: res.exitCode ?? -1,
  };
}

export async function getRemoteUrl(cwd: string, remote = "origin"): Promise<string | null> {
  const res = await tryGit(cwd, ["config", "--get", `remote.${remote}.url`]);
  if (res.exitCode !== 0) return null;
  const url = res.stdout.trim();
  return url.length > 0 ? url : null;
}

// Remote-tracking branches win over same-named local ones so a branch ref
// always means the mirror's current tip.
export async function resolveCommit(
  cwd: string,
  ref: string,
  remote = "origin",
): Promise<string | null> {
  const candidates = [`refs/remotes/${remote}/${ref}`, `refs/tags/${ref}`, ref];

  for (const candidate of candidates) {
    const res = await tryGit(cwd, ["rev-parse", "--verify", "--quiet", `${candidate}^{commit}`]);
    if (res.exitCode === 0) {
      const sha = res.stdout.trim();
      if (sha.length > 0) return sha;
    }
  }

  return null;
}

export function extractGitErrorOutput(err: GitError): { stdout: string; stderr: string } {
  const cause = err.cause;
  if (cause && typeof cause === "object") {
    const stdoutRaw = "stdout" in cause ? cause.stdout : undefined;
    const stderrRaw = "stderr" in cause ? cause.stderr : undefined;
    return {
      stdout: typeof stdoutRaw === "string" ? stdoutRaw : stdoutRaw ? String(stdoutRaw) : "",
      stderr: typeof stderrRaw === "string" ? stderrRaw : stderrRaw ? String(stderrRaw) : "",
    };
  }
  return { stdout: "", stderr: "" };
}

export function resolveExecaErrorOutput(err: unknown): {
  stdout: string;
  stderr: string;
  message: string;
} {
  if (!err || typeof err !== "object") {
    return { stdout: "", stderr: "", message: String(err) };
  }

  const stdoutRaw = "stdout" in err ? err.stdout : undefined;
  const stderrRaw = "stderr" in err ? err.stderr : undefined;
  const messageRaw = "message" in err ? err.message : undefined;

  return {
    stdout: toText(stdoutRaw),
    stderr: toText(stderrRaw),
    message: typeof messageRaw === "string" ? messageRaw : String(err),
  };
}

function toText(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined || value === null) return "";
  return String(value);
}
