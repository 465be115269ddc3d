import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ArtifactStore, tailLines } from "./artifact-store.js";
import { ArtifactStoreError } from "./errors.js";

let root: string;
let scratch: string;
let store: ArtifactStore;

beforeEach(async () => {
  root = await fse.mkdtemp(path.join(os.tmpdir(), "artifact-store-"));
  scratch = await fse.mkdtemp(path.join(os.tmpdir(), "artifact-scratch-"));
  store = new ArtifactStore(root);
});

afterEach(async () => {
  await fse.remove(root);
  await fse.remove(scratch);
});

async function scratchFile(name: string, contents: string): Promise<string> {
  const filePath = path.join(scratch, "SPEDIXF405", "bin", name);
  await fse.outputFile(filePath, contents);
  return filePath;
}

describe("ArtifactStore logs", () => {
  it("appends streamed output and drops writes after close", async () => {
    const writer = store.openLogWriter("b-1");
    expect(writer.write("Setting vehicle to: Copter\n")).toBe(true);
    expect(writer.write(Buffer.from("[ 1/10] Compiling\n"))).toBe(true);
    await writer.close();

    expect(writer.write("late\n")).toBe(false);
    expect(await store.getLog("b-1")).toBe("Setting vehicle to: Copter\n[ 1/10] Compiling\n");
    expect(store.hasLog("b-1")).toBe(true);
    expect(store.logRef("b-1")).toBe("b-1/build.log");
  });

  it("returns the tail of a log", async () => {
    const writer = store.openLogWriter("b-1");
    writer.write("one\ntwo\nthree\n");
    await writer.close();

    expect(await store.getLog("b-1", { tail: 2 })).toBe("two\nthree\n");
    expect(await store.getLog("missing")).toBeNull();
  });

  it("refuses new writers once sealed", async () => {
    await store.seal("b-1");

    expect(await store.isSealed("b-1")).toBe(true);
    expect(() => store.openLogWriter("b-1")).toThrow(ArtifactStoreError);
  });
});

describe("ArtifactStore artifacts", () => {
  it("stores artifacts under the build id and serves the primary by default", async () => {
    const primary = await scratchFile("arducopter.apj", "{\"board\":\"SPEDIXF405\"}");
    const secondary = await scratchFile("arducopter.bin", "binary");

    expect(await store.putArtifact("b-1", primary)).toBe("b-1/arducopter.apj");
    expect(await store.putArtifact("b-1", secondary)).toBe("b-1/arducopter.bin");

    expect(await store.listArtifacts("b-1")).toEqual(["arducopter.apj", "arducopter.bin"]);
    expect(String(await store.getArtifact("b-1"))).toBe("{\"board\":\"SPEDIXF405\"}");
    expect(String(await store.getArtifact("b-1", "arducopter.bin"))).toBe("binary");
    expect(await store.getArtifact("b-1", "arducopter.hex")).toBeNull();
    expect(await store.getArtifact("b-2")).toBeNull();
  });

  it("keeps stored artifacts when the workspace is wiped", async () => {
    const primary = await scratchFile("arducopter.apj", "first build");
    await store.putArtifact("b-1", primary);

    await fse.remove(scratch);

    expect(String(await store.getArtifact("b-1"))).toBe("first build");
  });

  it("rejects artifacts for sealed builds", async () => {
    const primary = await scratchFile("arducopter.apj", "x");
    await store.seal("b-1");

    await expect(store.putArtifact("b-1", primary)).rejects.toThrowError("Storage for build b-1 is sealed.");
  });

  it("rejects build ids that would escape the store", () => {
    expect(() => store.logPath("../etc")).toThrow(ArtifactStoreError);
    expect(() => store.logPath(".hidden")).toThrow(ArtifactStoreError);
  });

  it("removes everything stored for a build", async () => {
    await store.putArtifact("b-1", await scratchFile("arducopter.apj", "x"));

    await store.remove("b-1");

    expect(await store.listArtifacts("b-1")).toEqual([]);
    expect(await fse.pathExists(path.join(root, "b-1"))).toBe(false);
  });
});

describe("tailLines", () => {
  it("keeps the trailing newline state", () => {
    expect(tailLines("a\nb\nc", 2)).toBe("b\nc");
    expect(tailLines("a\nb\n", 5)).toBe("a\nb\n");
    expect(tailLines("a\nb\n", 0)).toBe("");
  });
});
