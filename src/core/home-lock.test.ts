import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { UserFacingError } from "./errors.js";
import { acquireHomeLock, UNREADABLE_LOCK_GRACE_MS } from "./home-lock.js";

let dir: string;
let lockPath: string;

beforeEach(async () => {
  dir = await fse.mkdtemp(path.join(os.tmpdir(), "home-lock-"));
  lockPath = path.join(dir, "orchestrator.lock");
});

afterEach(async () => {
  await fse.remove(dir);
});

describe("acquireHomeLock", () => {
  it("records the owning pid and removes the file on release", async () => {
    const lock = acquireHomeLock(lockPath);

    expect(await fse.readJson(lockPath)).toMatchObject({ pid: process.pid });

    lock.release();
    lock.release();
    expect(await fse.pathExists(lockPath)).toBe(false);
  });

  it("refuses a second orchestrator while the holder is alive", () => {
    const lock = acquireHomeLock(lockPath);

    try {
      expect(() => acquireHomeLock(lockPath)).toThrow(UserFacingError);
      expect(() => acquireHomeLock(lockPath)).toThrowError(`Another orchestrator (pid ${process.pid}) holds ${lockPath}.`);
    } finally {
      lock.release();
    }
  });

  it("takes over a lock left by a dead process", async () => {
    // Pids are capped well below this on Linux and macOS.
    await fse.outputJson(lockPath, { pid: 2 ** 30, started_at: "2024-01-01T00:00:00.000Z" });

    const lock = acquireHomeLock(lockPath);

    expect(await fse.readJson(lockPath)).toMatchObject({ pid: process.pid });
    lock.release();
  });

  it("treats a fresh lock without a readable pid as held", async () => {
    await fse.outputFile(lockPath, "");

    expect(() => acquireHomeLock(lockPath)).toThrowError(`${lockPath} exists but holds no readable pid yet.`);
    expect(await fse.readFile(lockPath, "utf8")).toBe("");
  });

  it("takes over an unreadable lock file once it is old", async () => {
    await fse.outputFile(lockPath, "garbage");
    const past = new Date(Date.now() - UNREADABLE_LOCK_GRACE_MS - 60_000);
    await fse.utimes(lockPath, past, past);

    const lock = acquireHomeLock(lockPath);

    expect(await fse.readJson(lockPath)).toMatchObject({ pid: process.pid });
    lock.release();
  });

  it("leaves no temp files behind", async () => {
    const lock = acquireHomeLock(lockPath);
    expect(() => acquireHomeLock(lockPath)).toThrow(UserFacingError);
    lock.release();

    expect(await fse.readdir(dir)).toEqual([]);
  });
});
