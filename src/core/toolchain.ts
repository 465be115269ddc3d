/*
Purpose: the process boundary to the firmware build system.
Assumptions: the toolchain is opaque; we only see exit codes, interleaved output and the
files it leaves in the declared output directory.
*/

import path from "node:path";
import type { Readable } from "node:stream";

import { execa } from "execa";
import fg from "fast-glob";

import type { LogWriter } from "./artifact-store.js";
import type { ToolchainConfig, ToolchainStep } from "./config.js";
import type { BuildConfig } from "./configurator.js";
import type { WorkspaceLease } from "./workspace-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type ToolchainInvocation = {
  buildId: string;
  config: BuildConfig;
  workspace: Pick<WorkspaceLease, "slotId" | "srcDir" | "hwdefPath" | "outDir">;
  log: LogWriter;
  // Aborting requests termination: SIGTERM, then SIGKILL after the grace period.
  signal: AbortSignal;
};

export type ToolchainResult = {
  exitCode: number | null;
  failedStep: string | null;
  aborted: boolean;
};

export interface Toolchain {
  run(invocation: ToolchainInvocation): Promise<ToolchainResult>;
  // Absolute paths of produced artifacts, primary first.
  collectArtifacts(invocation: ToolchainInvocation): Promise<string[]>;
}

export const SUCCESS_MARKER = "done build";

const PLACEHOLDER_KEYS = ["board", "vehicle", "version", "out", "hwdef", "src"] as const;
type PlaceholderKey = (typeof PLACEHOLDER_KEYS)[number];

export type CommandToolchainOptions = ToolchainConfig & {
  graceMs: number;
};

// =============================================================================
// COMMAND TOOLCHAIN
// =============================================================================

export class CommandToolchain implements Toolchain {
  private readonly steps: ToolchainStep[];
  private readonly pathPrefix: string[];
  private readonly env: Record<string, string>;
  private readonly artifactPatterns: string[];
  private readonly graceMs: number;

  constructor(opts: CommandToolchainOptions) {
    this.steps = opts.steps;
    this.pathPrefix = opts.path;
    this.env = opts.env;
    this.artifactPatterns = opts.artifacts;
    this.graceMs = opts.graceMs;
  }

  async run(invocation: ToolchainInvocation): Promise<ToolchainResult> {
    const env = this.buildEnv();
    const vars = placeholderValues(invocation);

    for (const step of this.steps) {
      if (invocation.signal.aborted) {
        return { exitCode: null, failedStep: step.name, aborted: true };
      }

      invocation.log.write(`Running ${step.name}\n`);
      const exitCode = await this.runStep(step, invocation, vars, env);

      if (invocation.signal.aborted) {
        return { exitCode, failedStep: step.name, aborted: true };
      }
      if (exitCode !== 0) {
        return { exitCode, failedStep: step.name, aborted: false };
      }
    }

    invocation.log.write(`${SUCCESS_MARKER}\n`);
    return { exitCode: 0, failedStep: null, aborted: false };
  }

  async collectArtifacts(invocation: ToolchainInvocation): Promise<string[]> {
    const vars = placeholderValues(invocation);
    const found: string[] = [];

    // Pattern order decides which artifact is primary.
    for (const pattern of this.artifactPatterns) {
      const matches = await fg(substitute(pattern, vars), {
        cwd: invocation.workspace.outDir,
        absolute: true,
        onlyFiles: true,
        dot: false,
      });
      for (const match of matches.sort()) {
        if (!found.includes(match)) found.push(match);
      }
    }

    return found;
  }

  private async runStep(
    step: ToolchainStep,
    invocation: ToolchainInvocation,
    vars: Record<PlaceholderKey, string>,
    env: Record<string, string>,
  ): Promise<number | null> {
    const args = step.args.map((arg) => substitute(arg, vars));
    const subprocess = execa(step.command, args, {
      cwd: invocation.workspace.srcDir,
      env,
      all: true,
      buffer: false,
      reject: false,
      stdin: "ignore",
    });

    const drained = subprocess.all ? pipeToLog(subprocess.all, invocation.log) : Promise.resolve();

    const onAbort = () => {
      subprocess.kill("SIGTERM", { forceKillAfterTimeout: this.graceMs });
    };
    invocation.signal.addEventListener("abort", onAbort, { once: true });
    if (invocation.signal.aborted) onAbort();

    try {
      const result = await subprocess;
      await drained;

      if (typeof result.exitCode !== "number") {
        invocation.log.write(
          `${step.name} ended without an exit code (signal ${result.signal ?? "none"})\n`,
        );
        return null;
      }
      return result.exitCode;
    } finally {
      invocation.signal.removeEventListener("abort", onAbort);
    }
  }

  private buildEnv(): Record<string, string> {
    const inherited = process.env.PATH ?? "";
    const searchPath = [...this.pathPrefix, inherited].filter((entry) => entry.length > 0);
    return { ...this.env, PATH: searchPath.join(path.delimiter) };
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function placeholderValues(invocation: ToolchainInvocation): Record<PlaceholderKey, string> {
  return {
    board: invocation.config.board,
    vehicle: invocation.config.vehicle,
    version: invocation.config.version,
    out: invocation.workspace.outDir,
    hwdef: invocation.workspace.hwdefPath,
    src: invocation.workspace.srcDir,
  };
}

function isPlaceholderKey(value: string): value is PlaceholderKey {
  return PLACEHOLDER_KEYS.some((key) => key === value);
}

export function substitute(template: string, vars: Record<PlaceholderKey, string>): string {
  return template.replace(/\{([a-z]+)\}/g, (match, key: string) =>
    isPlaceholderKey(key) ? vars[key] : match,
  );
}

function pipeToLog(stream: Readable, log: LogWriter): Promise<void> {
  return new Promise<void>((resolve) => {
    stream.on("data", (chunk: Buffer | string) => {
      log.write(chunk);
    });
    stream.once("end", () => resolve());
    stream.once("close", () => resolve());
    stream.once("error", (err: Error) => {
      log.write(`toolchain output stream failed: ${err.message}\n`);
      resolve();
    });
  });
}
