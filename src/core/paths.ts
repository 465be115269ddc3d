import os from "node:os";
import path from "node:path";

// =============================================================================
// TYPES
// =============================================================================

export type PathsContext = {
  home: string;
};

export type ResolveHomeOptions = {
  home?: string;
  configDir?: string;
};

export const HOME_ENV_VAR = "FWBUILD_HOME";

// =============================================================================
// CONTEXT
// =============================================================================

export function resolveHome(opts: ResolveHomeOptions = {}): string {
  if (opts.home) {
    return path.resolve(opts.configDir ?? process.cwd(), opts.home);
  }

  const fromEnv = process.env[HOME_ENV_VAR];
  if (fromEnv) {
    return path.resolve(fromEnv);
  }

  return path.join(os.homedir(), ".fwbuild");
}

export function createPathsContext(opts: ResolveHomeOptions = {}): PathsContext {
  return { home: resolveHome(opts) };
}

// =============================================================================
// PATH HELPERS
// =============================================================================

export function homeLockPath(paths: PathsContext): string {
  return path.join(paths.home, "orchestrator.lock");
}

export function buildStateDir(paths: PathsContext): string {
  return path.join(paths.home, "state", "builds");
}

export function artifactsRoot(paths: PathsContext): string {
  return path.join(paths.home, "artifacts");
}

export function workspacesRoot(paths: PathsContext): string {
  return path.join(paths.home, "workspaces");
}

export function orchestratorLogPath(paths: PathsContext): string {
  return path.join(paths.home, "logs", "orchestrator.jsonl");
}

export type SlotPaths = {
  slotId: number;
  dir: string;
  srcDir: string;
  hwdefPath: string;
  outDir: string;
};

export function slotPaths(root: string, slotId: number): SlotPaths {
  const dir = path.join(root, `slot-${slotId}`);
  return {
    slotId,
    dir,
    srcDir: path.join(dir, "src"),
    hwdefPath: path.join(dir, "extra_hwdef.dat"),
    outDir: path.join(dir, "out"),
  };
}
