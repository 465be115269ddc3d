/*
Purpose: durable, crash-consistent record of every build, one JSON file per build id.
Assumptions: a single orchestrator process owns the directory (see home-lock.ts).
Writes are serialized per build and hit disk (temp file + fsync + rename) before the
in-memory snapshot is replaced; readers only ever see frozen, fully committed snapshots.
*/

import fs from "node:fs/promises";
import path from "node:path";
import { randomUUID } from "node:crypto";

import fse from "fs-extra";

import {
  BuildSchema,
  isTerminal,
  markBuildFailed,
  type Build,
  type BuildState,
} from "./build.js";
import { StatusStoreError } from "./errors.js";
import { KeyedLock } from "./keyed-lock.js";

// =============================================================================
// TYPES
// =============================================================================

export type BuildFilter = {
  vehicle?: string;
  board?: string;
  state?: BuildState;
  limit?: number;
  offset?: number;
};

export type BuildPage = {
  builds: Build[];
  total: number;
  limit: number;
  offset: number;
};

export type BuildMutator = (current: Build) => Build | null;

export type UpdateResult = {
  build: Build;
  changed: boolean;
};

export const DEFAULT_LIST_LIMIT = 20;

const RECORD_SUFFIX = ".json";

// =============================================================================
// STORE
// =============================================================================

export class StatusStore {
  private readonly builds = new Map<string, Build>();
  private readonly locks = new KeyedLock();
  private nextSeq = 0;

  constructor(public readonly dir: string) {}

  async load(): Promise<number> {
    this.builds.clear();
    this.nextSeq = 0;

    try {
      await fse.ensureDir(this.dir);
      const entries = await fse.readdir(this.dir);

      for (const entry of entries) {
        const fullPath = path.join(this.dir, entry);
        if (entry.includes(".tmp")) {
          // Leftover from a write interrupted before its rename.
          await fse.remove(fullPath);
          continue;
        }
        if (!entry.endsWith(RECORD_SUFFIX)) continue;

        const build = await readBuildRecord(fullPath);
        this.builds.set(build.id, freezeBuild(build));
        this.nextSeq = Math.max(this.nextSeq, build.seq + 1);
      }
    } catch (err) {
      if (err instanceof StatusStoreError) throw err;
      throw new StatusStoreError(`Failed to load build records from ${this.dir}`, err);
    }

    return this.builds.size;
  }

  get(id: string): Build | null {
    return this.builds.get(id) ?? null;
  }

  list(filter: BuildFilter = {}): BuildPage {
    const limit = Math.max(0, filter.limit ?? DEFAULT_LIST_LIMIT);
    const offset = Math.max(0, filter.offset ?? 0);
    const vehicle = filter.vehicle?.toLowerCase();

    const matching = [...this.builds.values()]
      .filter((build) => !vehicle || build.request.vehicle === vehicle)
      .filter((build) => !filter.board || build.request.board === filter.board)
      .filter((build) => !filter.state || build.state === filter.state)
      .sort(compareNewestFirst);

    return {
      builds: matching.slice(offset, offset + limit),
      total: matching.length,
      limit,
      offset,
    };
  }

  all(): Build[] {
    return [...this.builds.values()].sort(compareNewestFirst);
  }

  pendingInAdmissionOrder(): Build[] {
    return [...this.builds.values()]
      .filter((build) => build.state === "PENDING")
      .sort((a, b) => a.seq - b.seq);
  }

  inFlightCount(): number {
    let count = 0;
    for (const build of this.builds.values()) {
      if (!isTerminal(build.state)) count += 1;
    }
    return count;
  }

  findInFlightByHash(hash: string): Build | null {
    for (const build of this.builds.values()) {
      if (build.request_hash === hash && !isTerminal(build.state)) return build;
    }
    return null;
  }

  // The store stamps the admission sequence in call order; any seq on the input is replaced.
  async create(build: Build): Promise<Build> {
    const record: Build = { ...build, seq: this.nextSeq };
    this.nextSeq += 1;
    return this.locks.run(record.id, async () => {
      if (this.builds.has(record.id)) {
        throw new StatusStoreError(`Build ${record.id} already exists.`);
      }
      return this.commit(record);
    });
  }

  // The mutator runs under the build's lock against the latest committed snapshot;
  // returning null leaves the record untouched.
  async update(id: string, mutate: BuildMutator): Promise<UpdateResult | null> {
    return this.locks.run(id, async () => {
      const current = this.builds.get(id);
      if (!current) return null;

      const next = mutate(current);
      if (next === null) {
        return { build: current, changed: false };
      }

      return { build: await this.commit(next), changed: true };
    });
  }

  async remove(id: string): Promise<boolean> {
    return this.locks.run(id, async () => {
      if (!this.builds.has(id)) return false;
      try {
        await fse.remove(this.recordPath(id));
      } catch (err) {
        throw new StatusStoreError(`Failed to remove build record ${id}`, err);
      }
      this.builds.delete(id);
      return true;
    });
  }

  // Called once at startup, before any worker runs: nothing can still own a RUNNING build.
  async reconcileInterrupted(logRefFor: (build: Build) => string | undefined): Promise<Build[]> {
    const interrupted: Build[] = [];

    for (const build of [...this.builds.values()]) {
      if (build.state !== "RUNNING") continue;

      const result = await this.update(build.id, (current) =>
        current.state === "RUNNING"
          ? markBuildFailed(
              current,
              {
                kind: "Interrupted",
                message: "Orchestrator restarted while the build was running.",
              },
              logRefFor(current),
            )
          : null,
      );
      if (result?.changed) interrupted.push(result.build);
    }

    return interrupted;
  }

  recordPath(id: string): string {
    return path.join(this.dir, `${id}${RECORD_SUFFIX}`);
  }

  private async commit(build: Build): Promise<Build> {
    const parsed = BuildSchema.safeParse(build);
    if (!parsed.success) {
      throw new StatusStoreError(`Cannot save build ${build.id}: ${parsed.error.toString()}`);
    }

    try {
      await writeStateFile(this.recordPath(build.id), parsed.data);
    } catch (err) {
      throw new StatusStoreError(`Failed to persist build ${build.id}`, err);
    }

    const snapshot = freezeBuild(parsed.data);
    this.builds.set(snapshot.id, snapshot);
    return snapshot;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

async function readBuildRecord(filePath: string): Promise<Build> {
  const raw = await fse.readFile(filePath, "utf8");

  let doc: unknown;
  try {
    doc = JSON.parse(raw);
  } catch (err) {
    throw new StatusStoreError(`Build record at ${filePath} is not valid JSON`, err);
  }

  const parsed = BuildSchema.safeParse(doc);
  if (!parsed.success) {
    throw new StatusStoreError(
      `Invalid build record at ${filePath}: ${parsed.error.toString()}`,
      parsed.error,
    );
  }

  return parsed.data;
}

async function writeStateFile(statePath: string, build: Build): Promise<void> {
  const dir = path.dirname(statePath);
  await fse.ensureDir(dir);

  const tmpPath = `${statePath}.${randomUUID()}.tmp`;
  const handle = await fs.open(tmpPath, "w");

  try {
    await handle.writeFile(JSON.stringify(build, null, 2) + "\n", "utf8");
    await handle.sync();
    await handle.close();
    await fs.rename(tmpPath, statePath);
  } catch (err) {
    await handle.close().catch(() => undefined);
    await fse.remove(tmpPath).catch(() => undefined);
    throw err;
  }
}

function freezeBuild(build: Build): Build {
  Object.freeze(build.request.features);
  Object.freeze(build.request);
  if (build.error) Object.freeze(build.error);
  return Object.freeze(build);
}

function compareNewestFirst(a: Build, b: Build): number {
  if (a.created_at !== b.created_at) {
    return a.created_at < b.created_at ? 1 : -1;
  }
  return b.seq - a.seq;
}
