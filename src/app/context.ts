/**
 * AppContext resolves the loaded config and home directory without mutating globals.
 * Purpose: make the config path and FWBUILD_HOME explicit for CLI and engine consumers.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ configPath, config }).
 */

import path from "node:path";

import type { ProjectConfig } from "../core/config.js";
import { createPathsContext, type PathsContext } from "../core/paths.js";


// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  configPath: string;
  config: ProjectConfig;
  paths: PathsContext;
};

export type CreateAppContextInput = {
  configPath: string;
  config: ProjectConfig;
  // Overrides both the config's home and FWBUILD_HOME.
  home?: string;
};


// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const configPath = path.resolve(input.configPath);

  return {
    configPath,
    config: input.config,
    paths: createPathsContext({
      home: input.home ?? input.config.home,
      configDir: path.dirname(configPath),
    }),
  };
}
