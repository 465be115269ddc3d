import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadAppContext } from "../app/config/load-app-context.js";
import { openBuildEngine } from "../app/engine.js";
import { StaticFeatureCatalog } from "../core/catalog.js";
import { UserFacingError } from "../core/errors.js";
import { MemoryLogger } from "../core/logger.js";
import { HOME_ENV_VAR, homeLockPath } from "../core/paths.js";
import { FakeProvisioner, FakeToolchain, TEST_CATALOG } from "../core/__tests__/fakes.js";

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// HELPERS
// =============================================================================

function makeProject(extraConfig = ""): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "app-context-"));
  tempDirs.push(dir);
  fs.writeFileSync(
    path.join(dir, "fwbuild.yaml"),
    [
      "source_mirror: ./mirror.git",
      "catalog_path: ./catalog.yaml",
      "pool_size: 2",
      "queue_ceiling: 6",
      "build_timeout_minutes: 30",
      extraConfig,
    ].join("\n"),
    "utf8",
  );
  return dir;
}

// =============================================================================
// TESTS
// =============================================================================

describe("loadAppContext", () => {
  it("reads fwbuild.yaml from the working directory and uses FWBUILD_HOME", () => {
    const project = makeProject();

    const ctx = loadAppContext({ cwd: project });

    expect(ctx.configPath).toBe(path.join(project, "fwbuild.yaml"));
    expect(ctx.config.pool_size).toBe(2);
    expect(ctx.paths.home).toBe(path.resolve(process.env[HOME_ENV_VAR] ?? ""));
  });

  it("prefers a home set in the config, resolved against the config directory", () => {
    const project = makeProject("home: ./state");

    const ctx = loadAppContext({ explicitConfigPath: path.join(project, "fwbuild.yaml") });

    expect(ctx.paths.home).toBe(path.join(project, "state"));
  });

  it("lets an explicit home override the config", () => {
    const project = makeProject("home: ./state");
    const home = path.join(project, "elsewhere");

    expect(loadAppContext({ cwd: project, home }).paths.home).toBe(home);
  });
});

describe("openBuildEngine", () => {
  it("holds the home lock until closed", async () => {
    const project = makeProject("home: ./state");
    const ctx = loadAppContext({ cwd: project });
    const options = {
      provisioner: new FakeProvisioner(),
      toolchain: new FakeToolchain(),
      catalog: new StaticFeatureCatalog(TEST_CATALOG),
      logger: new MemoryLogger(),
    };

    const engine = openBuildEngine(ctx, options);
    expect(fs.existsSync(homeLockPath(ctx.paths))).toBe(true);
    expect(() => openBuildEngine(ctx, options)).toThrow(UserFacingError);

    await engine.close();
    expect(fs.existsSync(homeLockPath(ctx.paths))).toBe(false);

    const reopened = openBuildEngine(ctx, options);
    await reopened.close();
  });

  it("starts with the configured pool size", async () => {
    const project = makeProject("home: ./state");
    const ctx = loadAppContext({ cwd: project });
    const provisioner = new FakeProvisioner();

    const engine = openBuildEngine(ctx, {
      provisioner,
      toolchain: new FakeToolchain(),
      catalog: new StaticFeatureCatalog(TEST_CATALOG),
      logger: new MemoryLogger(),
    });
    try {
      await engine.orchestrator.start();

      expect(provisioner.prepared).toEqual([0, 1]);
    } finally {
      await engine.close();
    }
  });
});
