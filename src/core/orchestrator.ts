/*
Purpose: admit build requests, run them on a fixed worker pool (one worker per workspace
slot) and drive every build through PENDING -> RUNNING -> SUCCESS | FAILURE | CANCELLED.
Assumptions: one orchestrator per home directory; the status store is the only source of
truth and its write failures halt the orchestrator.
Usage:
  const orchestrator = new BuildOrchestrator({ store, artifacts, pool, catalog, toolchain, ... });
  await orchestrator.start();
  const { buildId } = await orchestrator.submit({ vehicle, board, version, features });
  const build = await orchestrator.waitForTerminal(buildId);
*/

import type { LogWriter } from "./artifact-store.js";
import { ArtifactStore } from "./artifact-store.js";
import {
  createBuild,
  isTerminal,
  markBuildCancelled,
  markBuildFailed,
  markBuildRunning,
  markBuildSucceeded,
  parseBuildRequest,
  recordBuildCommit,
  requestHash,
  type Build,
  type BuildError,
  type BuildRequest,
} from "./build.js";
import { BuildQueue } from "./build-queue.js";
import type { CatalogLookup, FeatureCatalog } from "./catalog.js";
import { BuildConfigurator } from "./configurator.js";
import { formatErrorMessage } from "./error-format.js";
import {
  AdmissionError,
  BuildConfigError,
  CatalogUnavailableError,
  CheckoutError,
  MissingArtifactError,
  OrchestratorError,
  StatusStoreError,
  ToolchainError,
} from "./errors.js";
import { logOrchestratorEvent, type EventLogger } from "./logger.js";
import { computeProgress, type BuildProgress } from "./progress.js";
import type { BuildFilter, BuildMutator, BuildPage, StatusStore, UpdateResult } from "./status-store.js";
import type { Toolchain, ToolchainInvocation } from "./toolchain.js";
import { capitalize, MAX_TIMER_MS } from "./utils.js";
import type { WorkspaceLease, WorkspacePool } from "./workspace-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildOrchestratorOptions = {
  store: StatusStore;
  artifacts: ArtifactStore;
  pool: WorkspacePool;
  catalog: FeatureCatalog;
  toolchain: Toolchain;
  // Maximum PENDING + RUNNING builds; further submissions get QueueFull.
  queueCeiling: number;
  buildTimeoutMs: number;
  dedupeIdentical?: boolean;
  logger?: EventLogger;
  // Invoked once when a status write fails; the orchestrator has already halted.
  onFatal?: (error: StatusStoreError) => void;
};

export type SubmitResult = {
  buildId: string;
  deduplicated: boolean;
};

export type CancelStatus = "ok" | "already_terminal" | "not_found";

export type CancelResult = {
  status: CancelStatus;
  build: Build | null;
};

export type PruneResult = {
  removed: string[];
};

type Lifecycle = "idle" | "running" | "stopping" | "stopped" | "failed";

type AbortCause = "cancel" | "timeout" | "shutdown";

type RunningBuild = {
  controller: AbortController;
  cause: AbortCause | null;
  timeoutTimer: NodeJS.Timeout | null;
};

type BuildOutcome =
  | { state: "SUCCESS"; artifactRef: string }
  | { state: "FAILURE"; error: BuildError }
  | { state: "CANCELLED" };

// =============================================================================
// ORCHESTRATOR
// =============================================================================

export class BuildOrchestrator {
  private readonly store: StatusStore;
  private readonly artifacts: ArtifactStore;
  private readonly pool: WorkspacePool;
  private readonly catalog: FeatureCatalog;
  private readonly configurator: BuildConfigurator;
  private readonly toolchain: Toolchain;
  private readonly queueCeiling: number;
  private readonly buildTimeoutMs: number;
  private readonly dedupeIdentical: boolean;
  private readonly logger: EventLogger;
  private readonly onFatal: (error: StatusStoreError) => void;

  private readonly queue = new BuildQueue();
  private readonly running = new Map<string, RunningBuild>();
  private readonly terminalWaiters = new Map<string, Array<(build: Build) => void>>();
  private readonly stopController = new AbortController();

  private lifecycle: Lifecycle = "idle";
  private workers: Array<Promise<void>> = [];
  // Submissions past the ceiling check whose record is not yet committed.
  private admitting = 0;
  private fatalError: StatusStoreError | null = null;

  constructor(opts: BuildOrchestratorOptions) {
    if (!Number.isInteger(opts.queueCeiling) || opts.queueCeiling < 1) {
      throw new OrchestratorError(`Queue ceiling must be a positive integer (got ${opts.queueCeiling}).`);
    }
    if (!(opts.buildTimeoutMs > 0 && opts.buildTimeoutMs <= MAX_TIMER_MS)) {
      throw new OrchestratorError(
        `Build timeout must be between 1ms and ${MAX_TIMER_MS}ms (got ${opts.buildTimeoutMs}ms).`,
      );
    }

    this.store = opts.store;
    this.artifacts = opts.artifacts;
    this.pool = opts.pool;
    this.catalog = opts.catalog;
    this.configurator = new BuildConfigurator(opts.catalog, opts.pool);
    this.toolchain = opts.toolchain;
    this.queueCeiling = opts.queueCeiling;
    this.buildTimeoutMs = opts.buildTimeoutMs;
    this.dedupeIdentical = opts.dedupeIdentical ?? false;
    this.logger = opts.logger ?? NOOP_LOGGER;
    this.onFatal = opts.onFatal ?? (() => undefined);
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async start(): Promise<void> {
    if (this.lifecycle !== "idle") {
      throw new OrchestratorError(`Orchestrator cannot start from state ${this.lifecycle}.`);
    }

    await this.store.load();

    const interrupted = await this.store.reconcileInterrupted((build) => this.logRefFor(build.id));
    for (const build of interrupted) {
      await this.artifacts.seal(build.id);
      logOrchestratorEvent(this.logger, "build.interrupted", {
        buildId: build.id,
        slot: null,
      });
    }

    const pending = this.store.pendingInAdmissionOrder();
    for (const build of pending) {
      this.queue.enqueue(build.id);
    }

    await this.pool.init();

    this.lifecycle = "running";
    logOrchestratorEvent(this.logger, "orchestrator.started", {
      slots: this.pool.capacity,
      requeued: pending.length,
      interrupted: interrupted.length,
    });

    this.workers = Array.from({ length: this.pool.capacity }, (_, index) => this.workerLoop(index));
  }

  // Running builds are interrupted and recorded as FAILURE{Interrupted}; PENDING builds
  // stay queued on disk and are picked up by the next start().
  async stop(): Promise<void> {
    if (this.lifecycle === "idle" || this.lifecycle === "stopped") return;
    if (this.lifecycle === "running") this.lifecycle = "stopping";

    this.stopController.abort(new OrchestratorError("Orchestrator is stopping."));
    for (const buildId of this.running.keys()) {
      this.abortRunning(buildId, "shutdown");
    }

    await Promise.all(this.workers);
    this.workers = [];
    if (this.lifecycle === "stopping") this.lifecycle = "stopped";
    logOrchestratorEvent(this.logger, "orchestrator.stopped", {
      state: this.lifecycle,
      queued: this.queue.snapshot(),
      workspaces: this.pool.snapshot(),
    });
  }

  get state(): Lifecycle {
    return this.lifecycle;
  }

  // ---------------------------------------------------------------------------
  // Admission
  // ---------------------------------------------------------------------------

  async submit(input: unknown): Promise<SubmitResult> {
    this.assertAccepting();

    const request = parseBuildRequest(input);
    await this.validateAgainstCatalog(request);

    if (this.dedupeIdentical) {
      const existing = this.store.findInFlightByHash(requestHash(request));
      if (existing) {
        logOrchestratorEvent(this.logger, "build.deduplicated", { buildId: existing.id });
        return { buildId: existing.id, deduplicated: true };
      }
    }

    // Synchronous from here until the counter moves: no await between check and reservation.
    const inFlight = this.store.inFlightCount() + this.admitting;
    if (inFlight >= this.queueCeiling) {
      throw new AdmissionError(
        "QueueFull",
        `Build queue is full (${inFlight} of ${this.queueCeiling} builds pending or running).`,
      );
    }
    this.admitting += 1;

    let build: Build;
    try {
      build = await this.store.create(createBuild(request));
    } catch (err) {
      throw this.escalate(err);
    } finally {
      this.admitting -= 1;
    }

    this.queue.enqueue(build.id);
    logOrchestratorEvent(this.logger, "build.submitted", {
      buildId: build.id,
      vehicle: request.vehicle,
      board: request.board,
      version: request.version,
      features: request.features,
    });

    return { buildId: build.id, deduplicated: false };
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  get(buildId: string): Build | null {
    return this.store.get(buildId);
  }

  list(filter: BuildFilter = {}): BuildPage {
    return this.store.list(filter);
  }

  async getLog(buildId: string, opts: { tail?: number } = {}): Promise<string | null> {
    if (!this.store.get(buildId)) return null;
    return this.artifacts.getLog(buildId, opts);
  }

  // Artifacts are only served for successful builds.
  async getArtifact(buildId: string, name?: string): Promise<Buffer | null> {
    const build = this.store.get(buildId);
    if (!build || build.state !== "SUCCESS") return null;
    return this.artifacts.getArtifact(buildId, name);
  }

  async listArtifacts(buildId: string): Promise<string[]> {
    const build = this.store.get(buildId);
    if (!build || build.state !== "SUCCESS") return [];
    return this.artifacts.listArtifacts(buildId);
  }

  async progress(buildId: string): Promise<BuildProgress | null> {
    const build = this.store.get(buildId);
    if (!build) return null;

    const log = build.state === "RUNNING" ? await this.artifacts.getLog(buildId) : null;
    return { state: build.state, percent: computeProgress(build.state, log) };
  }

  waitForTerminal(buildId: string, timeoutMs?: number): Promise<Build | null> {
    const existing = this.store.get(buildId);
    if (!existing) return Promise.resolve(null);
    if (isTerminal(existing.state)) return Promise.resolve(existing);

    return new Promise<Build | null>((resolve, reject) => {
      let timer: NodeJS.Timeout | null = null;

      const onTerminal = (build: Build): void => {
        if (timer) clearTimeout(timer);
        resolve(build);
      };

      if (timeoutMs !== undefined) {
        timer = setTimeout(() => {
          const waiters = this.terminalWaiters.get(buildId) ?? [];
          this.terminalWaiters.set(
            buildId,
            waiters.filter((waiter) => waiter !== onTerminal),
          );
          reject(new OrchestratorError(`Timed out after ${timeoutMs}ms waiting for build ${buildId}.`));
        }, Math.max(1, timeoutMs));
      }

      const waiters = this.terminalWaiters.get(buildId) ?? [];
      waiters.push(onTerminal);
      this.terminalWaiters.set(buildId, waiters);
    });
  }

  // ---------------------------------------------------------------------------
  // Cancellation & pruning
  // ---------------------------------------------------------------------------

  // PENDING builds are cancelled in place; RUNNING builds get their toolchain signalled and
  // the owning worker records CANCELLED once the process is gone.
  async cancel(buildId: string): Promise<CancelResult> {
    let status: CancelStatus = "ok";

    const result = await this.commit(buildId, (current) => {
      if (current.state === "PENDING") {
        this.queue.remove(buildId);
        return markBuildCancelled(current);
      }
      if (current.state === "RUNNING") {
        this.abortRunning(buildId, "cancel");
        return null;
      }
      status = "already_terminal";
      return null;
    });

    if (!result) {
      return { status: "not_found", build: null };
    }

    logOrchestratorEvent(this.logger, "build.cancel", {
      buildId,
      status,
      state: result.build.state,
    });
    return { status, build: result.build };
  }

  async prune(opts: { olderThanMs: number; now?: number }): Promise<PruneResult> {
    const cutoff = new Date((opts.now ?? Date.now()) - opts.olderThanMs).toISOString();
    const removed: string[] = [];

    for (const build of this.store.all()) {
      if (!isTerminal(build.state) || !build.finished_at || build.finished_at >= cutoff) continue;

      await this.artifacts.remove(build.id);
      try {
        await this.store.remove(build.id);
      } catch (err) {
        throw this.escalate(err);
      }
      removed.push(build.id);
    }

    if (removed.length > 0) {
      logOrchestratorEvent(this.logger, "builds.pruned", { count: removed.length, cutoff });
    }
    return { removed };
  }

  // ---------------------------------------------------------------------------
  // Workers
  // ---------------------------------------------------------------------------

  private async workerLoop(worker: number): Promise<void> {
    const signal = this.stopController.signal;

    while (!signal.aborted) {
      let buildId: string;
      try {
        buildId = await this.queue.take(signal);
      } catch (err) {
        if (signal.aborted) return;
        this.logWorkerError(worker, undefined, err);
        continue;
      }

      // Cancelled while queued.
      if (this.store.get(buildId)?.state !== "PENDING") continue;

      try {
        await this.pool.withLease(buildId, (lease) => this.runBuild(buildId, lease), signal);
      } catch (err) {
        if (err instanceof StatusStoreError) {
          this.escalate(err);
          return;
        }
        if (signal.aborted) return;
        this.logWorkerError(worker, buildId, err);
      }
    }
  }

  private async runBuild(buildId: string, lease: WorkspaceLease): Promise<void> {
    const runtime: RunningBuild = { controller: new AbortController(), cause: null, timeoutTimer: null };
    // Registered before the RUNNING transition so a cancel that observes RUNNING can signal it.
    this.running.set(buildId, runtime);

    try {
      const started = await this.commit(buildId, (current) =>
        current.state === "PENDING" ? markBuildRunning(current, lease.slotId) : null,
      );
      if (!started?.changed) return;

      if (this.stopController.signal.aborted) this.abortRunning(buildId, "shutdown");
      runtime.timeoutTimer = setTimeout(() => this.abortRunning(buildId, "timeout"), this.buildTimeoutMs);

      logOrchestratorEvent(this.logger, "build.started", { buildId, slot: lease.slotId });

      const outcome = await this.executeWithLog(started.build, lease, runtime);
      const logRef = this.logRefFor(buildId);

      // Runs under the build's lock, as cancel() does: an abort seen here always wins over SUCCESS.
      let final: BuildOutcome = outcome;
      const finished = await this.commit(buildId, (current) => {
        if (current.state !== "RUNNING") return null;
        if (outcome.state === "SUCCESS" && runtime.controller.signal.aborted) {
          final = this.abortOutcome(runtime.cause);
        }
        return applyOutcome(current, final, logRef);
      });

      logOrchestratorEvent(this.logger, "build.finished", {
        buildId,
        slot: lease.slotId,
        state: finished?.build.state ?? final.state,
        error_kind: final.state === "FAILURE" ? final.error.kind : null,
      });
    } finally {
      if (runtime.timeoutTimer) clearTimeout(runtime.timeoutTimer);
      this.running.delete(buildId);
    }
  }

  private async executeWithLog(
    build: Build,
    lease: WorkspaceLease,
    runtime: RunningBuild,
  ): Promise<BuildOutcome> {
    let log: LogWriter | null = null;
    let outcome: BuildOutcome;

    try {
      log = this.artifacts.openLogWriter(build.id);
      outcome = await this.execute(build, lease, log, runtime);
    } catch (err) {
      if (err instanceof StatusStoreError) throw err;
      outcome = this.classifyFailure(err, runtime);
    }

    if (runtime.timeoutTimer) clearTimeout(runtime.timeoutTimer);

    if (log) {
      if (outcome.state === "FAILURE") {
        log.write(`Build failed (${outcome.error.kind}): ${outcome.error.message}\n`);
      } else if (outcome.state === "CANCELLED") {
        log.write("Build cancelled\n");
      }

      try {
        await log.close();
      } catch (err) {
        this.logWorkerError(lease.slotId, build.id, err);
        if (outcome.state === "SUCCESS") {
          outcome = { state: "FAILURE", error: { kind: "Internal", message: formatErrorMessage(err) } };
        }
      }
    }

    try {
      await this.artifacts.seal(build.id);
    } catch (err) {
      this.logWorkerError(lease.slotId, build.id, err);
    }
    return outcome;
  }

  private async execute(
    build: Build,
    lease: WorkspaceLease,
    log: LogWriter,
    runtime: RunningBuild,
  ): Promise<BuildOutcome> {
    const signal = runtime.controller.signal;
    const { request } = build;

    log.write(`Setting vehicle to: ${capitalize(request.vehicle)}\n`);
    log.write(`Board: ${request.board}, version: ${request.version}\n`);

    const target = await this.configurator.resolveTarget(request);
    signal.throwIfAborted();

    log.write(`Checking out ${target.ref}\n`);
    const commit = await this.pool.reset(lease, target.ref);
    await this.commit(build.id, (current) =>
      current.state === "RUNNING" ? recordBuildCommit(current, commit) : null,
    );
    log.write(`Source at ${commit}\n`);
    signal.throwIfAborted();

    const config = await this.configurator.materialize(lease, request, target);
    log.write(`Generated extra_hwdef with ${config.defines.length} defines (${config.fingerprint.slice(0, 12)})\n`);
    signal.throwIfAborted();

    const invocation: ToolchainInvocation = {
      buildId: build.id,
      config,
      workspace: lease,
      log,
      signal,
    };

    const result = await this.toolchain.run(invocation);
    if (result.aborted || signal.aborted) {
      return this.abortOutcome(runtime.cause);
    }
    if (result.exitCode !== 0) {
      throw new ToolchainError(
        "NonZeroExit",
        `Step ${result.failedStep ?? "<unknown>"} exited with ${result.exitCode ?? "no exit code"}.`,
      );
    }

    const files = await this.toolchain.collectArtifacts(invocation);
    signal.throwIfAborted();
    if (files.length === 0) {
      throw new MissingArtifactError(`Toolchain succeeded but left no artifacts in ${lease.outDir}.`);
    }

    const refs: string[] = [];
    for (const file of files) {
      refs.push(await this.artifacts.putArtifact(build.id, file));
    }
    signal.throwIfAborted();

    return { state: "SUCCESS", artifactRef: refs[0] };
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async validateAgainstCatalog(request: BuildRequest): Promise<void> {
    let lookup: CatalogLookup;
    try {
      lookup = await this.catalog.lookup(request);
    } catch (err) {
      throw new AdmissionError(
        "CatalogUnavailable",
        `Feature catalog unavailable: ${formatErrorMessage(err)}`,
        err,
      );
    }

    if (!lookup.found) {
      throw new AdmissionError("InvalidRequest", lookup.reason);
    }

    const known = new Set(lookup.target.features.map((feature) => feature.id));
    const unknown = request.features.filter((id) => !known.has(id));
    if (unknown.length > 0) {
      throw new AdmissionError(
        "InvalidRequest",
        `Unknown features for ${request.vehicle} ${request.version} on ${request.board}: ${unknown.join(", ")}.`,
      );
    }
  }

  private assertAccepting(): void {
    if (this.fatalError) {
      throw new OrchestratorError("Orchestrator halted after a status store failure.", this.fatalError);
    }
    if (this.lifecycle !== "running") {
      throw new OrchestratorError(`Orchestrator is not accepting builds (state ${this.lifecycle}).`);
    }
  }

  private async commit(buildId: string, mutate: BuildMutator): Promise<UpdateResult | null> {
    let result: UpdateResult | null;
    try {
      result = await this.store.update(buildId, mutate);
    } catch (err) {
      throw this.escalate(err);
    }

    if (result?.changed && isTerminal(result.build.state)) {
      this.notifyTerminal(result.build);
    }
    return result;
  }

  private abortRunning(buildId: string, cause: AbortCause): boolean {
    const runtime = this.running.get(buildId);
    if (!runtime || runtime.controller.signal.aborted) return false;

    runtime.cause = cause;
    runtime.controller.abort(new OrchestratorError(`Build ${buildId} aborted (${cause}).`));
    return true;
  }

  private abortOutcome(cause: AbortCause | null): BuildOutcome {
    if (cause === "cancel") {
      return { state: "CANCELLED" };
    }
    if (cause === "timeout") {
      const minutes = Math.round((this.buildTimeoutMs / 60_000) * 100) / 100;
      return {
        state: "FAILURE",
        error: { kind: "Timeout", message: `Build exceeded the ${minutes} minute limit.` },
      };
    }
    return {
      state: "FAILURE",
      error: { kind: "Interrupted", message: "Orchestrator stopped while the build was running." },
    };
  }

  private classifyFailure(err: unknown, runtime: RunningBuild): BuildOutcome {
    if (runtime.controller.signal.aborted) {
      return this.abortOutcome(runtime.cause);
    }

    if (
      err instanceof BuildConfigError ||
      err instanceof CheckoutError ||
      err instanceof ToolchainError ||
      err instanceof MissingArtifactError ||
      err instanceof CatalogUnavailableError
    ) {
      return { state: "FAILURE", error: { kind: err.kind, message: err.message } };
    }

    return { state: "FAILURE", error: { kind: "Internal", message: formatErrorMessage(err) } };
  }

  // Status writes that fail leave the persisted record unknown; stop taking work.
  private escalate(err: unknown): unknown {
    if (!(err instanceof StatusStoreError) || this.fatalError) return err;

    this.fatalError = err;
    this.lifecycle = "failed";
    logOrchestratorEvent(this.logger, "orchestrator.fatal", { message: formatErrorMessage(err) });

    this.stopController.abort(err);
    for (const buildId of this.running.keys()) {
      this.abortRunning(buildId, "shutdown");
    }

    this.onFatal(err);
    return err;
  }

  private notifyTerminal(build: Build): void {
    const waiters = this.terminalWaiters.get(build.id);
    if (!waiters || waiters.length === 0) return;

    this.terminalWaiters.delete(build.id);
    for (const waiter of waiters) {
      waiter(build);
    }
  }

  private logRefFor(buildId: string): string | undefined {
    return this.artifacts.hasLog(buildId) ? this.artifacts.logRef(buildId) : undefined;
  }

  private logWorkerError(worker: number, buildId: string | undefined, err: unknown): void {
    logOrchestratorEvent(this.logger, "worker.error", {
      worker,
      ...(buildId ? { buildId } : {}),
      message: formatErrorMessage(err),
    });
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function applyOutcome(current: Build, outcome: BuildOutcome, logRef: string | undefined): Build {
  switch (outcome.state) {
    case "SUCCESS":
      return markBuildSucceeded(current, { artifactRef: outcome.artifactRef, logRef });
    case "FAILURE":
      return markBuildFailed(current, outcome.error, logRef);
    case "CANCELLED":
      return markBuildCancelled(current, logRef);
  }
}

const NOOP_LOGGER: EventLogger = {
  log: () => undefined,
  close: () => undefined,
};
