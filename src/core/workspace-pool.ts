/*
Purpose: fixed set of slot-indexed source checkouts, each leased to at most one build.
Assumptions: acquire() is the only place a worker waits for capacity; slots are never
destroyed during normal operation, only re-cloned when a reset reports corruption.
Usage: await pool.withLease(buildId, async (lease) => { await pool.reset(lease, ref); ... });
*/

import fse from "fs-extra";

import { CheckoutError, OrchestratorError } from "./errors.js";
import { logOrchestratorEvent, type EventLogger } from "./logger.js";
import { slotPaths, type SlotPaths } from "./paths.js";

// =============================================================================
// TYPES
// =============================================================================

export interface WorkspaceProvisioner {
  // Ensure a usable clone exists at slot.srcDir (clone when missing or foreign).
  prepare(slot: SlotPaths): Promise<void>;
  reclone(slot: SlotPaths): Promise<void>;
  // Hard clean + checkout; resolves to the commit now checked out.
  checkout(slot: SlotPaths, ref: string): Promise<string>;
}

export type WorkspaceLease = Readonly<
  SlotPaths & {
    owner: string;
    token: number;
  }
>;

export type WorkspaceSnapshot = {
  slot_id: number;
  lease_owner: string | null;
  dirty: boolean;
  needs_reclone: boolean;
};

export type WorkspacePoolOptions = {
  root: string;
  size: number;
  provisioner: WorkspaceProvisioner;
  logger?: EventLogger;
};

type SlotRecord = {
  paths: SlotPaths;
  leaseOwner: string | null;
  leaseToken: number | null;
  dirty: boolean;
  needsReclone: boolean;
};

type Waiter = {
  owner: string;
  resolve: (lease: WorkspaceLease) => void;
  reject: (reason: unknown) => void;
  detach: () => void;
};

// =============================================================================
// POOL
// =============================================================================

export class WorkspacePool {
  private readonly slots: SlotRecord[];
  private readonly waiters: Waiter[] = [];
  private readonly provisioner: WorkspaceProvisioner;
  private readonly logger: EventLogger;
  private nextToken = 1;

  constructor(opts: WorkspacePoolOptions) {
    if (!Number.isInteger(opts.size) || opts.size < 1) {
      throw new OrchestratorError(`Workspace pool size must be a positive integer (got ${opts.size}).`);
    }

    this.provisioner = opts.provisioner;
    this.logger = opts.logger ?? NOOP_LOGGER;
    this.slots = Array.from({ length: opts.size }, (_, slotId) => ({
      paths: slotPaths(opts.root, slotId),
      leaseOwner: null,
      leaseToken: null,
      dirty: false,
      needsReclone: false,
    }));
  }

  get capacity(): number {
    return this.slots.length;
  }

  // Slots are prepared one at a time.
  async init(): Promise<void> {
    for (const slot of this.slots) {
      await this.provisioner.prepare(slot.paths);
      slot.dirty = false;
      slot.needsReclone = false;
    }
  }

  tryAcquire(owner: string): WorkspaceLease | null {
    const slot = this.slots.find((candidate) => candidate.leaseOwner === null);
    if (!slot) return null;
    return this.grant(slot, owner);
  }

  async acquire(owner: string, signal?: AbortSignal): Promise<WorkspaceLease> {
    signal?.throwIfAborted();

    const lease = this.waiters.length === 0 ? this.tryAcquire(owner) : null;
    if (lease) return lease;

    return new Promise<WorkspaceLease>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) this.waiters.splice(index, 1);
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        owner,
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  // Idempotent: releasing a stale or already released lease is a no-op.
  release(lease: WorkspaceLease): boolean {
    const slot = this.slots[lease.slotId];
    if (!slot || slot.leaseToken !== lease.token) return false;

    slot.leaseOwner = null;
    slot.leaseToken = null;

    const next = this.waiters.shift();
    if (next) {
      next.detach();
      next.resolve(this.grant(slot, next.owner));
    }

    return true;
  }

  async withLease<T>(
    owner: string,
    fn: (lease: WorkspaceLease) => Promise<T>,
    signal?: AbortSignal,
  ): Promise<T> {
    const lease = await this.acquire(owner, signal);
    try {
      return await fn(lease);
    } finally {
      this.release(lease);
    }
  }

  async reset(lease: WorkspaceLease, ref: string): Promise<string> {
    const slot = this.assertHeld(lease);

    if (slot.needsReclone) {
      logOrchestratorEvent(this.logger, "workspace.reclone", {
        buildId: lease.owner,
        slot: lease.slotId,
      });
      try {
        await this.provisioner.reclone(slot.paths);
      } catch (err) {
        throw new CheckoutError("GitFailure", `Re-clone of workspace slot ${lease.slotId} failed.`, err);
      }
      slot.needsReclone = false;
    }

    await fse.emptyDir(slot.paths.outDir);
    await fse.remove(slot.paths.hwdefPath);

    let commit: string;
    try {
      commit = await this.provisioner.checkout(slot.paths, ref);
    } catch (err) {
      if (err instanceof CheckoutError && err.kind === "CorruptWorkspace") {
        slot.needsReclone = true;
      }
      throw err;
    }

    slot.dirty = false;
    logOrchestratorEvent(this.logger, "workspace.reset", {
      buildId: lease.owner,
      slot: lease.slotId,
      ref,
      commit,
    });
    return commit;
  }

  markDirty(lease: WorkspaceLease): void {
    this.assertHeld(lease).dirty = true;
  }

  snapshot(): WorkspaceSnapshot[] {
    return this.slots.map((slot) => ({
      slot_id: slot.paths.slotId,
      lease_owner: slot.leaseOwner,
      dirty: slot.dirty,
      needs_reclone: slot.needsReclone,
    }));
  }

  private grant(slot: SlotRecord, owner: string): WorkspaceLease {
    const token = this.nextToken;
    this.nextToken += 1;
    slot.leaseOwner = owner;
    slot.leaseToken = token;
    return Object.freeze({ ...slot.paths, owner, token });
  }

  private assertHeld(lease: WorkspaceLease): SlotRecord {
    const slot = this.slots[lease.slotId];
    if (!slot || slot.leaseToken !== lease.token) {
      throw new OrchestratorError(
        `Lease on workspace slot ${lease.slotId} for ${lease.owner} is no longer held.`,
      );
    }
    return slot;
  }
}

const NOOP_LOGGER: EventLogger = {
  log: () => undefined,
  close: () => undefined,
};
