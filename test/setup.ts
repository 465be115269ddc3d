import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach } from "vitest";

import { HOME_ENV_VAR } from "../src/core/paths.js";


// =============================================================================
// FWBUILD_HOME ISOLATION
// =============================================================================

// Every test gets its own home so nothing lands in the developer's ~/.fwbuild.
let previousHome: string | undefined;
let testHome: string | null = null;

beforeEach(() => {
  previousHome = process.env[HOME_ENV_VAR];
  testHome = fs.mkdtempSync(path.join(os.tmpdir(), "fwbuild-home-"));
  process.env[HOME_ENV_VAR] = testHome;
});

afterEach(() => {
  if (previousHome === undefined) {
    delete process.env[HOME_ENV_VAR];
  } else {
    process.env[HOME_ENV_VAR] = previousHome;
  }

  if (testHome) {
    fs.rmSync(testHome, { recursive: true, force: true });
    testHome = null;
  }
});
