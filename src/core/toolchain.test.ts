import os from "node:os";
import path from "node:path";

import fse from "fs-extra";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { LogWriter } from "./artifact-store.js";
import type { ToolchainStep } from "./config.js";
import type { BuildConfig } from "./configurator.js";
import { slotPaths, type SlotPaths } from "./paths.js";
import { CommandToolchain, substitute, type ToolchainInvocation } from "./toolchain.js";

class MemoryLogWriter implements LogWriter {
  readonly buildId = "b-1";
  private readonly chunks: string[] = [];

  write(chunk: string | Uint8Array): boolean {
    this.chunks.push(typeof chunk === "string" ? chunk : Buffer.from(chunk).toString("utf8"));
    return true;
  }

  async close(): Promise<void> {}

  text(): string {
    return this.chunks.join("");
  }
}

const CONFIG: BuildConfig = {
  vehicle: "copter",
  board: "SPEDIXF405",
  version: "stable-4.5",
  ref: "Copter-4.5.7",
  defines: [],
  fingerprint: "0".repeat(64),
};

function nodeStep(name: string, script: string): ToolchainStep {
  return { name, command: process.execPath, args: ["-e", script] };
}

let root: string;
let slot: SlotPaths;
let log: MemoryLogWriter;

function invocation(signal = new AbortController().signal): ToolchainInvocation {
  return { buildId: "b-1", config: CONFIG, workspace: slot, log, signal };
}

function toolchain(steps: ToolchainStep[], overrides: Partial<ConstructorParameters<typeof CommandToolchain>[0]> = {}) {
  return new CommandToolchain({
    steps,
    path: [],
    env: {},
    artifacts: ["{board}/bin/*.apj", "{board}/bin/*.bin"],
    graceMs: 200,
    ...overrides,
  });
}

beforeEach(async () => {
  root = await fse.mkdtemp(path.join(os.tmpdir(), "toolchain-"));
  slot = slotPaths(root, 0);
  await fse.ensureDir(slot.srcDir);
  await fse.ensureDir(slot.outDir);
  log = new MemoryLogWriter();
});

afterEach(async () => {
  await fse.remove(root);
});

describe("CommandToolchain.run", () => {
  it("runs every step in the source tree and streams output to the log", async () => {
    const result = await toolchain([
      nodeStep("configure", "console.log('configure in ' + process.cwd())"),
      nodeStep("build", "console.log('[1/2] compile'); console.error('warning: unused'); console.log('[2/2] link')"),
    ]).run(invocation());

    expect(result).toEqual({ exitCode: 0, failedStep: null, aborted: false });

    const text = log.text();
    expect(text.startsWith("Running configure\n")).toBe(true);
    expect(text).toContain(`configure in ${await fse.realpath(slot.srcDir)}\n`);
    expect(text).toContain("Running build\n");
    expect(text).toContain("[1/2] compile\n");
    expect(text).toContain("warning: unused\n");
    expect(text).toContain("[2/2] link\n");
    expect(text.endsWith("done build\n")).toBe(true);
  });

  it("substitutes placeholders into step arguments", async () => {
    const result = await toolchain([
      {
        name: "configure",
        command: process.execPath,
        args: ["-e", "console.log(process.argv.slice(1).join(' '))", "--", "--board", "{board}", "--out", "{out}", "{vehicle}"],
      },
    ]).run(invocation());

    expect(result.exitCode).toBe(0);
    expect(log.text()).toContain(`--board SPEDIXF405 --out ${slot.outDir} copter\n`);
  });

  it("prepends configured directories to PATH and passes extra env", async () => {
    const toolDir = path.join(root, "gcc-arm", "bin");

    await toolchain(
      [nodeStep("env", "console.log(process.env.CCACHE_DIR + ' ' + process.env.PATH.split(require('path').delimiter)[0])")],
      { path: [toolDir], env: { CCACHE_DIR: "/var/cache/ccache" } },
    ).run(invocation());

    expect(log.text()).toContain(`/var/cache/ccache ${toolDir}\n`);
  });

  it("stops at the first failing step", async () => {
    const result = await toolchain([
      nodeStep("configure", "console.log('configured')"),
      nodeStep("build", "console.error('error: ld returned 1'); process.exit(3)"),
      nodeStep("package", "console.log('packaged')"),
    ]).run(invocation());

    expect(result).toEqual({ exitCode: 3, failedStep: "build", aborted: false });
    expect(log.text()).toContain("error: ld returned 1\n");
    expect(log.text()).not.toContain("Running package");
    expect(log.text()).not.toContain("done build");
  });

  it("terminates the running step when aborted", async () => {
    const controller = new AbortController();
    const running = toolchain([
      nodeStep("build", "console.log('ready'); setInterval(() => {}, 1000)"),
      nodeStep("package", "console.log('packaged')"),
    ]).run(invocation(controller.signal));

    await vi.waitFor(() => {
      expect(log.text()).toContain("ready\n");
    });
    controller.abort();

    const result = await running;
    expect(result.aborted).toBe(true);
    expect(result.failedStep).toBe("build");
    expect(log.text()).not.toContain("Running package");
  });

  it("does not start when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await toolchain([nodeStep("build", "console.log('never')")]).run(invocation(controller.signal));

    expect(result).toEqual({ exitCode: null, failedStep: "build", aborted: true });
    expect(log.text()).toBe("");
  });
});

describe("CommandToolchain.collectArtifacts", () => {
  it("returns matches in pattern order without duplicates", async () => {
    const binDir = path.join(slot.outDir, "SPEDIXF405", "bin");
    await fse.outputFile(path.join(binDir, "arducopter.bin"), "bin");
    await fse.outputFile(path.join(binDir, "arducopter.apj"), "apj");
    await fse.outputFile(path.join(binDir, "arducopter.elf"), "elf");

    const found = await toolchain([nodeStep("noop", "")], {
      artifacts: ["{board}/bin/*.apj", "{board}/bin/*.bin", "{board}/bin/arducopter.*"],
    }).collectArtifacts(invocation());

    expect(found).toEqual([
      path.join(binDir, "arducopter.apj"),
      path.join(binDir, "arducopter.bin"),
      path.join(binDir, "arducopter.elf"),
    ]);
  });

  it("returns nothing when the build left no artifacts", async () => {
    expect(await toolchain([nodeStep("noop", "")]).collectArtifacts(invocation())).toEqual([]);
  });
});

describe("substitute", () => {
  it("replaces known placeholders and leaves others alone", () => {
    const vars = {
      board: "MatekH743",
      vehicle: "plane",
      version: "stable-4.5",
      out: "/w/out",
      hwdef: "/w/extra_hwdef.dat",
      src: "/w/src",
    };

    expect(substitute("--board={board} --hwdef {hwdef} {unknown}", vars)).toBe(
      "--board=MatekH743 --hwdef /w/extra_hwdef.dat {unknown}",
    );
  });
});
