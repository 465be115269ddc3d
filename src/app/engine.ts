/*
Purpose: wire the orchestrator's components from an AppContext and own the home lock.
Assumptions: only one engine per home directory is open at a time (enforced by the lock).
Usage:
  const engine = openBuildEngine(appContext);
  await engine.orchestrator.start();
  ...
  await engine.close();
*/

import { ArtifactStore } from "../core/artifact-store.js";
import { FileFeatureCatalog, type FeatureCatalog } from "../core/catalog.js";
import { acquireHomeLock, type HomeLock } from "../core/home-lock.js";
import { JsonlLogger, logOrchestratorEvent, type EventLogger } from "../core/logger.js";
import { BuildOrchestrator } from "../core/orchestrator.js";
import {
  artifactsRoot,
  buildStateDir,
  homeLockPath,
  orchestratorLogPath,
  workspacesRoot,
} from "../core/paths.js";
import { StatusStore } from "../core/status-store.js";
import { CommandToolchain, type Toolchain } from "../core/toolchain.js";
import { WorkspacePool, type WorkspaceProvisioner } from "../core/workspace-pool.js";
import { GitWorkspaceProvisioner } from "../core/workspace-provisioner.js";
import type { StatusStoreError } from "../core/errors.js";

import type { AppContext } from "./context.js";

// Exit status used when the status store can no longer be written.
export const FATAL_EXIT_CODE = 70;

// =============================================================================
// TYPES
// =============================================================================

export type BuildEngine = {
  orchestrator: BuildOrchestrator;
  store: StatusStore;
  artifacts: ArtifactStore;
  logger: EventLogger;
  close: () => Promise<void>;
};

export type OpenBuildEngineOptions = {
  // Test seams; production uses git checkouts and the configured commands.
  provisioner?: WorkspaceProvisioner;
  toolchain?: Toolchain;
  catalog?: FeatureCatalog;
  logger?: EventLogger;
  onFatal?: (error: StatusStoreError) => void;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function openBuildEngine(ctx: AppContext, opts: OpenBuildEngineOptions = {}): BuildEngine {
  const { config, paths } = ctx;
  const lock: HomeLock = acquireHomeLock(homeLockPath(paths));

  const logger = opts.logger ?? new JsonlLogger(orchestratorLogPath(paths), { component: "orchestrator" });
  const store = new StatusStore(buildStateDir(paths));
  const artifacts = new ArtifactStore(artifactsRoot(paths));
  const pool = new WorkspacePool({
    root: workspacesRoot(paths),
    size: config.pool_size,
    provisioner: opts.provisioner ?? new GitWorkspaceProvisioner(config.source_mirror),
    logger,
  });
  const toolchain =
    opts.toolchain ??
    new CommandToolchain({ ...config.toolchain, graceMs: config.cancel_grace_seconds * 1000 });

  let closed = false;
  const release = (): void => {
    if (closed) return;
    closed = true;
    logger.close();
    lock.release();
  };

  const orchestrator = new BuildOrchestrator({
    store,
    artifacts,
    pool,
    catalog: opts.catalog ?? new FileFeatureCatalog(config.catalog_path),
    toolchain,
    queueCeiling: config.queue_ceiling,
    buildTimeoutMs: config.build_timeout_minutes * 60_000,
    dedupeIdentical: config.dedupe_identical,
    logger,
    onFatal:
      opts.onFatal ??
      ((error) => {
        logOrchestratorEvent(logger, "orchestrator.exit", { code: FATAL_EXIT_CODE });
        release();
        console.error(`Fatal: ${error.message}`);
        process.exit(FATAL_EXIT_CODE);
      }),
  });

  return {
    orchestrator,
    store,
    artifacts,
    logger,
    close: async () => {
      try {
        await orchestrator.stop();
      } finally {
        release();
      }
    },
  };
}
