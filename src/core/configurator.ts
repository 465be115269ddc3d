/*
Purpose: turn a validated build request into the feature configuration consumed by the toolchain.
Assumptions: unknown feature ids were already rejected at admission; this stage only
checks combinations (conflicts and dependencies) and never runs the compiler.
*/

import { createHash } from "node:crypto";

import fse from "fs-extra";

import type { BuildRequest } from "./build.js";
import type { CatalogTarget, FeatureCatalog } from "./catalog.js";
import { BuildConfigError, CatalogUnavailableError } from "./errors.js";
import type { WorkspaceLease, WorkspacePool } from "./workspace-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type FeatureDefine = {
  name: string;
  value: 0 | 1;
};

export type BuildConfig = {
  vehicle: string;
  board: string;
  version: string;
  ref: string;
  defines: FeatureDefine[];
  // sha256 of the rendered configuration file
  fingerprint: string;
};

// =============================================================================
// PURE PLANNING
// =============================================================================

export function planBuildConfig(request: BuildRequest, target: CatalogTarget): BuildConfig {
  const selected = new Set(request.features);
  const known = new Set(target.features.map((feature) => feature.id));

  const unknown = request.features.filter((id) => !known.has(id));
  if (unknown.length > 0) {
    throw new BuildConfigError(
      "IncompatibleFeatures",
      `Features not available for ${target.vehicle} ${target.version} on ${target.board}: ${unknown.join(", ")}`,
    );
  }

  const clashes = target.conflicts
    .filter(([a, b]) => selected.has(a) && selected.has(b))
    .map(([a, b]) => `${a} conflicts with ${b}`);

  const missing = target.features
    .filter((feature) => selected.has(feature.id))
    .flatMap((feature) =>
      feature.requires
        .filter((dependency) => !selected.has(dependency))
        .map((dependency) => `${feature.id} requires ${dependency}`),
    );

  const problems = [...clashes, ...missing].sort();
  if (problems.length > 0) {
    throw new BuildConfigError("IncompatibleFeatures", problems.join("; "));
  }

  const defines = target.features
    .map((feature): FeatureDefine => ({
      name: feature.id,
      value: selected.has(feature.id) ? 1 : 0,
    }))
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  const config: Omit<BuildConfig, "fingerprint"> = {
    vehicle: request.vehicle,
    board: request.board,
    version: request.version,
    ref: target.ref,
    defines,
  };

  return { ...config, fingerprint: fingerprintOf(renderDefines(config.defines)) };
}

// extra_hwdef format: clear every define first, then enabled, then disabled.
export function renderBuildConfig(config: Pick<BuildConfig, "defines">): string {
  return renderDefines(config.defines);
}

// =============================================================================
// CONFIGURATOR
// =============================================================================

export class BuildConfigurator {
  constructor(
    private readonly catalog: FeatureCatalog,
    private readonly pool: WorkspacePool,
  ) {}

  async resolveTarget(request: BuildRequest): Promise<CatalogTarget> {
    const lookup = await this.catalog.lookup(request);
    if (!lookup.found) {
      throw new CatalogUnavailableError(`Catalog no longer lists this target: ${lookup.reason}`);
    }
    return lookup.target;
  }

  // Writes the configuration into the leased workspace and marks the slot dirty.
  async materialize(
    lease: WorkspaceLease,
    request: BuildRequest,
    target?: CatalogTarget,
  ): Promise<BuildConfig> {
    const resolved = target ?? (await this.resolveTarget(request));
    const config = planBuildConfig(request, resolved);

    this.pool.markDirty(lease);
    await fse.outputFile(lease.hwdefPath, renderBuildConfig(config), "utf8");

    return config;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderDefines(defines: FeatureDefine[]): string {
  const lines = [
    ...defines.map((define) => `undef ${define.name}`),
    ...defines.filter((define) => define.value === 1).map((define) => `define ${define.name} 1`),
    ...defines.filter((define) => define.value === 0).map((define) => `define ${define.name} 0`),
  ];
  return lines.length > 0 ? `${lines.join("\n")}\n` : "";
}

function fingerprintOf(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}
