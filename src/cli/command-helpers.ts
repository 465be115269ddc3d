/*
Purpose: shared plumbing for the build commands: store access, option parsing, table output
and error normalization.
Assumptions: read-only commands may run while an orchestrator owns the home directory; records
are replaced atomically so a concurrent reader sees either the old or the new state.
*/

import type { AppContext } from "../app/context.js";
import { ArtifactStore } from "../core/artifact-store.js";
import { BuildStateSchema, type Build, type BuildState } from "../core/build.js";
import { formatErrorMessage } from "../core/error-format.js";
import {
  AdmissionError,
  ConfigError,
  StatusStoreError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
  type UserFacingErrorCode,
} from "../core/errors.js";
import { artifactsRoot, buildStateDir } from "../core/paths.js";
import { StatusStore } from "../core/status-store.js";

// =============================================================================
// STORES
// =============================================================================

export type ReadOnlyStores = {
  store: StatusStore;
  artifacts: ArtifactStore;
};

export async function openReadOnlyStores(ctx: AppContext): Promise<ReadOnlyStores> {
  const store = new StatusStore(buildStateDir(ctx.paths));
  await store.load();
  return { store, artifacts: new ArtifactStore(artifactsRoot(ctx.paths)) };
}

export function requireBuild(store: StatusStore, buildId: string): Build {
  const build = store.get(buildId);
  if (!build) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.build,
      title: "Build not found.",
      message: `No build with id ${buildId}.`,
      hint: "Run `fwbuild list` to see recorded builds.",
    });
  }
  return build;
}

// =============================================================================
// OPTION PARSING
// =============================================================================

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw invalidOption(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw invalidOption(`Expected a non-negative integer, got "${value}".`);
  }
  return parsed;
}

export function parsePositiveNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw invalidOption(`Expected a positive number, got "${value}".`);
  }
  return parsed;
}

export function parseBuildState(value: string): BuildState {
  const parsed = BuildStateSchema.safeParse(value.toUpperCase());
  if (!parsed.success) {
    throw invalidOption(
      `Unknown build state "${value}". Expected one of ${BuildStateSchema.options.join(", ")}.`,
    );
  }
  return parsed.data;
}

export function collectRepeatable(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

function invalidOption(message: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Invalid option.",
    message,
  });
}

// =============================================================================
// OUTPUT
// =============================================================================

export function formatTimestamp(ts: string | undefined): string {
  if (!ts) return "-";
  const parsed = new Date(ts);
  if (Number.isNaN(parsed.getTime())) return ts;
  return parsed
    .toISOString()
    .replace("T", " ")
    .replace(/\.\d+Z$/, "Z");
}

export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const renderRow = (cells: string[]): string =>
    cells
      .map((cell, column) => cell.padEnd(widths[column] ?? 0))
      .join("  ")
      .trimEnd();

  return [renderRow(headers), ...rows.map(renderRow)];
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

export function normalizeCommandError(error: unknown, title: string): UserFacingError {
  if (error instanceof UserFacingError) {
    return new UserFacingError({
      code: error.code,
      title,
      message: error.message,
      hint: error.hint,
      next: error.next,
      cause: error.cause ?? error,
    });
  }

  return new UserFacingError({
    code: resolveErrorCode(error),
    title,
    message: formatErrorMessage(error),
    hint: resolveHint(error),
    cause: error,
  });
}

function resolveErrorCode(error: unknown): UserFacingErrorCode {
  if (error instanceof ConfigError) return USER_FACING_ERROR_CODES.config;
  if (error instanceof StatusStoreError) return USER_FACING_ERROR_CODES.store;
  if (error instanceof AdmissionError) return USER_FACING_ERROR_CODES.build;
  return USER_FACING_ERROR_CODES.unknown;
}

function resolveHint(error: unknown): string | undefined {
  if (error instanceof StatusStoreError) {
    return "Check that FWBUILD_HOME is writable and that its build records are intact.";
  }
  if (error instanceof AdmissionError && error.kind === "QueueFull") {
    return "Wait for running builds to finish or raise queue_ceiling.";
  }
  if (error instanceof AdmissionError && error.kind === "CatalogUnavailable") {
    return "Check catalog_path in the project config.";
  }
  return undefined;
}
