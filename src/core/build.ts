import { createHash, randomUUID } from "node:crypto";

import { z } from "zod";

import { formatIssues } from "./config-loader.js";
import { AdmissionError, InvalidTransitionError } from "./errors.js";
import { isoNowNotBefore, timestampId } from "./utils.js";

// =============================================================================
// SCHEMAS
// =============================================================================

export const BuildStateSchema = z.enum(["PENDING", "RUNNING", "SUCCESS", "FAILURE", "CANCELLED"]);
export type BuildState = z.infer<typeof BuildStateSchema>;

export const TERMINAL_STATES: readonly BuildState[] = ["SUCCESS", "FAILURE", "CANCELLED"];

export const BuildErrorKindSchema = z.enum([
  "IncompatibleFeatures",
  "UnresolvableRef",
  "GitFailure",
  "CorruptWorkspace",
  "NonZeroExit",
  "Timeout",
  "Interrupted",
  "MissingArtifact",
  "CatalogUnavailable",
  "Internal",
]);
export type BuildErrorKind = z.infer<typeof BuildErrorKindSchema>;

export const BuildRequestSchema = z
  .object({
    vehicle: z.string().trim().min(1),
    board: z.string().trim().min(1),
    version: z.string().trim().min(1),
    features: z.array(z.string().trim().min(1)).default([]),
  })
  .strict();
export type BuildRequest = z.infer<typeof BuildRequestSchema>;
export type BuildRequestInput = z.input<typeof BuildRequestSchema>;

export const BuildErrorSchema = z
  .object({
    kind: BuildErrorKindSchema,
    message: z.string(),
  })
  .strict();
export type BuildError = z.infer<typeof BuildErrorSchema>;

export const BuildSchema = z
  .object({
    id: z.string().min(1),
    request: BuildRequestSchema,
    request_hash: z.string().min(1),
    state: BuildStateSchema,
    // Admission order, assigned by the status store; created_at can tie.
    seq: z.number().int().nonnegative(),
    workspace_id: z.number().int().nonnegative().optional(),
    commit: z.string().optional(),
    created_at: z.string(),
    started_at: z.string().optional(),
    finished_at: z.string().optional(),
    error: BuildErrorSchema.optional(),
    artifact_ref: z.string().optional(),
    log_ref: z.string().optional(),
  })
  .strict();
export type Build = z.infer<typeof BuildSchema>;

// =============================================================================
// REQUESTS
// =============================================================================

// Vehicle ids are case-insensitive; features are a set, stored sorted.
export function parseBuildRequest(input: unknown): BuildRequest {
  const parsed = BuildRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw new AdmissionError(
      "InvalidRequest",
      `Invalid build request:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const request = parsed.data;
  return {
    vehicle: request.vehicle.toLowerCase(),
    board: request.board,
    version: request.version,
    features: [...new Set(request.features)].sort(),
  };
}

export function requestHash(request: BuildRequest): string {
  const canonical = JSON.stringify([
    request.vehicle,
    request.board,
    request.version,
    request.features,
  ]);
  return createHash("sha256").update(canonical).digest("hex");
}

// =============================================================================
// LIFECYCLE
// =============================================================================

export function newBuildId(now: Date = new Date()): string {
  return `${timestampId(now)}-${randomUUID().slice(0, 8)}`;
}

export function createBuild(request: BuildRequest, opts: { id?: string; now?: string } = {}): Build {
  return {
    id: opts.id ?? newBuildId(),
    request,
    request_hash: requestHash(request),
    state: "PENDING",
    seq: 0,
    created_at: opts.now ?? isoNowNotBefore(undefined),
  };
}

export function isTerminal(state: BuildState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function markBuildRunning(build: Build, workspaceId: number): Build {
  assertState(build, ["PENDING"], "RUNNING");
  return {
    ...build,
    state: "RUNNING",
    workspace_id: workspaceId,
    started_at: isoNowNotBefore(build.created_at),
  };
}

export function recordBuildCommit(build: Build, commit: string): Build {
  assertState(build, ["RUNNING"], "RUNNING");
  return { ...build, commit };
}

export function markBuildSucceeded(
  build: Build,
  refs: { artifactRef: string; logRef?: string },
): Build {
  assertState(build, ["RUNNING"], "SUCCESS");
  return finish(build, "SUCCESS", { artifact_ref: refs.artifactRef, log_ref: refs.logRef });
}

export function markBuildFailed(build: Build, error: BuildError, logRef?: string): Build {
  assertState(build, ["RUNNING"], "FAILURE");
  return finish(build, "FAILURE", { error, log_ref: logRef });
}

export function markBuildCancelled(build: Build, logRef?: string): Build {
  assertState(build, ["PENDING", "RUNNING"], "CANCELLED");
  return finish(build, "CANCELLED", { log_ref: logRef });
}

// =============================================================================
// INTERNALS
// =============================================================================

function assertState(build: Build, allowed: BuildState[], to: BuildState): void {
  if (!allowed.includes(build.state)) {
    throw new InvalidTransitionError(build.id, build.state, to);
  }
}

function finish(
  build: Build,
  state: BuildState,
  extra: Pick<Build, "artifact_ref" | "log_ref" | "error">,
): Build {
  const { workspace_id: _released, ...rest } = build;
  const finished: Build = {
    ...rest,
    state,
    finished_at: isoNowNotBefore(build.started_at ?? build.created_at),
  };

  if (extra.artifact_ref !== undefined) finished.artifact_ref = extra.artifact_ref;
  if (extra.log_ref !== undefined) finished.log_ref = extra.log_ref;
  if (extra.error !== undefined) finished.error = extra.error;

  return finished;
}
