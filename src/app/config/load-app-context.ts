/**
 * loadAppContext resolves project config + paths for CLI entrypoints.
 * Usage: const appContext = loadAppContext({ explicitConfigPath: opts.config }).
 */

import path from "node:path";

import { loadProjectConfig } from "../../core/config-loader.js";
import { createAppContext, type AppContext } from "../context.js";


export const DEFAULT_CONFIG_FILE = "fwbuild.yaml";

// =============================================================================
// TYPES
// =============================================================================

export type LoadAppContextArgs = {
  explicitConfigPath?: string;
  cwd?: string;
  home?: string;
};


// =============================================================================
// PUBLIC API
// =============================================================================

export function loadAppContext(args: LoadAppContextArgs = {}): AppContext {
  const cwd = args.cwd ?? process.cwd();
  const configPath = path.resolve(cwd, args.explicitConfigPath ?? DEFAULT_CONFIG_FILE);

  const config = loadProjectConfig(configPath);
  return createAppContext({ configPath, config, home: args.home });
}
