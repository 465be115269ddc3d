import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { CheckoutError, OrchestratorError } from "./errors.js";
import { MemoryLogger } from "./logger.js";
import { WorkspacePool } from "./workspace-pool.js";
import { FakeProvisioner } from "./__tests__/fakes.js";

let root: string;
let provisioner: FakeProvisioner;
let logger: MemoryLogger;

function createPool(size: number): WorkspacePool {
  return new WorkspacePool({ root, size, provisioner, logger });
}

beforeEach(async () => {
  root = await fse.mkdtemp(path.join(os.tmpdir(), "workspace-pool-"));
  provisioner = new FakeProvisioner();
  logger = new MemoryLogger();
});

afterEach(async () => {
  await fse.remove(root);
});

describe("WorkspacePool leasing", () => {
  it("rejects a non-positive size", () => {
    expect(() => createPool(0)).toThrow(OrchestratorError);
  });

  it("prepares every slot on init", async () => {
    const pool = createPool(3);

    await pool.init();

    expect(provisioner.prepared).toEqual([0, 1, 2]);
    expect(await fse.pathExists(path.join(root, "slot-2", "src"))).toBe(true);
  });

  it("never leases one slot to two owners", async () => {
    const pool = createPool(2);

    const a = await pool.acquire("b-1");
    const b = await pool.acquire("b-2");

    expect(new Set([a.slotId, b.slotId])).toEqual(new Set([0, 1]));
    expect(pool.tryAcquire("b-3")).toBeNull();
  });

  it("hands released slots to waiters in FIFO order", async () => {
    const pool = createPool(1);
    const first = await pool.acquire("b-1");
    const granted: string[] = [];

    const second = pool.acquire("b-2").then((lease) => {
      granted.push(lease.owner);
      return lease;
    });
    const third = pool.acquire("b-3").then((lease) => {
      granted.push(lease.owner);
      return lease;
    });

    pool.release(first);
    pool.release(await second);
    await third;

    expect(granted).toEqual(["b-2", "b-3"]);
  });

  it("ignores stale releases", async () => {
    const pool = createPool(1);
    const first = await pool.acquire("b-1");

    expect(pool.release(first)).toBe(true);
    const second = await pool.acquire("b-2");
    expect(pool.release(first)).toBe(false);
    expect(pool.snapshot()[0].lease_owner).toBe("b-2");
    expect(pool.release(second)).toBe(true);
  });

  it("drops aborted waiters", async () => {
    const pool = createPool(1);
    const held = await pool.acquire("b-1");
    const controller = new AbortController();

    const waiting = pool.acquire("b-2", controller.signal);
    controller.abort(new Error("stopping"));

    await expect(waiting).rejects.toThrowError("stopping");
    pool.release(held);
    expect(pool.tryAcquire("b-3")?.slotId).toBe(0);
  });

  it("releases the lease when the callback throws", async () => {
    const pool = createPool(1);

    await expect(
      pool.withLease("b-1", async () => {
        throw new Error("toolchain exploded");
      }),
    ).rejects.toThrowError("toolchain exploded");

    expect(pool.snapshot()[0].lease_owner).toBeNull();
  });
});

describe("WorkspacePool reset", () => {
  it("clears build outputs and returns the checked-out commit", async () => {
    const pool = createPool(1);
    await pool.init();
    const lease = await pool.acquire("b-1");
    await fse.outputFile(path.join(lease.outDir, "SPEDIXF405", "bin", "old.apj"), "stale");
    await fse.outputFile(lease.hwdefPath, "define OLD 1\n");
    pool.markDirty(lease);

    const commit = await pool.reset(lease, "Copter-4.5.7");

    expect(commit).toBe("commit-of-Copter-4.5.7");
    expect(await fse.readdir(lease.outDir)).toEqual([]);
    expect(await fse.pathExists(lease.hwdefPath)).toBe(false);
    expect(pool.snapshot()[0].dirty).toBe(false);
    expect(logger.ofType("workspace.reset")).toHaveLength(1);
  });

  it("re-clones a slot before its next reset after corruption", async () => {
    const pool = createPool(1);
    provisioner.failCheckout("broken", new CheckoutError("CorruptWorkspace", "index file corrupt"));

    const lease = await pool.acquire("b-1");
    await expect(pool.reset(lease, "broken")).rejects.toMatchObject({ kind: "CorruptWorkspace" });
    expect(pool.snapshot()[0].needs_reclone).toBe(true);
    pool.release(lease);

    const next = await pool.acquire("b-2");
    await pool.reset(next, "Copter-4.5.7");

    expect(provisioner.recloned).toEqual([0]);
    expect(pool.snapshot()[0].needs_reclone).toBe(false);
    expect(logger.ofType("workspace.reclone")).toHaveLength(1);
  });

  it("refuses to reset through a released lease", async () => {
    const pool = createPool(1);
    const lease = await pool.acquire("b-1");
    pool.release(lease);

    await expect(pool.reset(lease, "Copter-4.5.7")).rejects.toThrowError(
      "Lease on workspace slot 0 for b-1 is no longer held.",
    );
  });
});
