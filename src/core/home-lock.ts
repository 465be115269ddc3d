/*
Purpose: one orchestrator per home directory.
Assumptions: the lock file appears atomically, already holding its pid (written to a
temp file, then hard-linked into place). A lock whose pid no longer exists is stale and
may be taken over; an unreadable one is stale only once it is older than a few seconds.
*/

import { randomUUID } from "node:crypto";
import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { isoNow } from "./utils.js";

export type HomeLock = {
  lockPath: string;
  release: () => void;
};

// Unreadable locks younger than this may belong to a writer that has not finished.
export const UNREADABLE_LOCK_GRACE_MS = 5_000;

const LockFileSchema = z.object({
  pid: z.number().int(),
  started_at: z.string(),
});

export function acquireHomeLock(lockPath: string): HomeLock {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  for (let attempt = 0; attempt < 2; attempt += 1) {
    if (!linkLockFile(lockPath)) {
      const holder = readLockHolder(lockPath);
      if (holder !== null && isProcessAlive(holder)) {
        throw new UserFacingError({
          code: USER_FACING_ERROR_CODES.lock,
          title: "Orchestrator already running.",
          message: `Another orchestrator (pid ${holder}) holds ${lockPath}.`,
          hint: "Stop the other process or point FWBUILD_HOME at a different directory.",
        });
      }
      if (holder === null && isRecent(lockPath)) {
        throw new UserFacingError({
          code: USER_FACING_ERROR_CODES.lock,
          title: "Orchestrator lock contended.",
          message: `${lockPath} exists but holds no readable pid yet.`,
          hint: "Retry in a few seconds.",
        });
      }

      fs.rmSync(lockPath, { force: true });
      continue;
    }

    let released = false;
    return {
      lockPath,
      release: () => {
        if (released) return;
        released = true;
        if (readLockHolder(lockPath) === process.pid) {
          fs.rmSync(lockPath, { force: true });
        }
      },
    };
  }

  throw new UserFacingError({
    code: USER_FACING_ERROR_CODES.lock,
    title: "Orchestrator lock contended.",
    message: `Could not take ${lockPath} after removing a stale lock.`,
  });
}

// =============================================================================
// INTERNALS
// =============================================================================

// Returns false when a lock file already exists.
function linkLockFile(lockPath: string): boolean {
  const tmpPath = `${lockPath}.${process.pid}.${randomUUID().slice(0, 8)}.tmp`;
  const fd = fs.openSync(tmpPath, "wx");
  try {
    fs.writeSync(fd, JSON.stringify({ pid: process.pid, started_at: isoNow() }, null, 2));
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }

  try {
    fs.linkSync(tmpPath, lockPath);
    return true;
  } catch (err) {
    if (isErrnoCode(err, "EEXIST")) return false;
    throw err;
  } finally {
    fs.rmSync(tmpPath, { force: true });
  }
}

function isRecent(lockPath: string): boolean {
  try {
    return Date.now() - fs.statSync(lockPath).mtimeMs < UNREADABLE_LOCK_GRACE_MS;
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return false;
    throw err;
  }
}

function readLockHolder(lockPath: string): number | null {
  let raw: string;
  try {
    raw = fs.readFileSync(lockPath, "utf8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) return null;
    throw err;
  }

  try {
    const parsed = LockFileSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data.pid : null;
  } catch (err) {
    if (err instanceof SyntaxError) return null;
    throw err;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to another user.
    return isErrnoCode(err, "EPERM");
  }
}

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}
