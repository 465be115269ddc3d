import { z } from "zod";

import { MAX_TIMER_MS } from "./utils.js";

export const MAX_BUILD_TIMEOUT_MINUTES = Math.floor(MAX_TIMER_MS / 60_000);
export const MAX_CANCEL_GRACE_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

// Placeholders substituted into toolchain args:
// {board} {vehicle} {version} {out} {hwdef} {src}
const ToolchainStepSchema = z
  .object({
    name: z.string().min(1),
    command: z.string().min(1),
    args: z.array(z.string()).default([]),
  })
  .strict();

export const DEFAULT_TOOLCHAIN_STEPS: ToolchainStep[] = [
  {
    name: "configure",
    command: "python3",
    args: ["./waf", "configure", "--board", "{board}", "--out", "{out}", "--extra-hwdef", "{hwdef}"],
  },
  { name: "clean", command: "python3", args: ["./waf", "clean"] },
  { name: "build", command: "python3", args: ["./waf", "{vehicle}"] },
];

export const DEFAULT_ARTIFACT_PATTERNS = [
  "{board}/bin/*.apj",
  "{board}/bin/*.bin",
  "{board}/bin/*.hex",
];

const ToolchainSchema = z
  .object({
    steps: z.array(ToolchainStepSchema).min(1).default(DEFAULT_TOOLCHAIN_STEPS),
    // Prepended to PATH in the order given.
    path: z.array(z.string().min(1)).default([]),
    env: z.record(z.string()).default({}),
    // Globs relative to the build output directory; the first match is the primary artifact.
    artifacts: z.array(z.string().min(1)).min(1).default(DEFAULT_ARTIFACT_PATTERNS),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    home: z.string().min(1).optional(),

    // Local mirror of the firmware source; workspaces fetch only from here.
    source_mirror: z.string().min(1),
    catalog_path: z.string().min(1),

    pool_size: z.number().int().positive(),
    queue_ceiling: z.number().int().positive(),
    build_timeout_minutes: z.number().positive().max(MAX_BUILD_TIMEOUT_MINUTES),
    cancel_grace_seconds: z.number().nonnegative().max(MAX_CANCEL_GRACE_SECONDS).default(10),

    dedupe_identical: z.boolean().default(false),
    retention_days: z.number().positive().optional(),

    toolchain: ToolchainSchema.default({}),
  })
  .strict();

export type ToolchainStep = z.infer<typeof ToolchainStepSchema>;
export type ToolchainConfig = z.infer<typeof ToolchainSchema>;
export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
