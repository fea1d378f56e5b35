/**
 * AppContext bundles the resolved config with where it came from.
 * Purpose: make the workspace root and config source explicit for CLI commands.
 * Assumptions: config has already been validated and its paths made absolute by the loader.
 * Usage: const ctx = createAppContext({ config, resolution });
 */

import type { ProjectConfig } from "../core/config.js";
import type { ConfigResolution, ConfigSource } from "../core/config-discovery.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  config: ProjectConfig;
  /** Null when running on defaults without a config file. */
  configPath: string | null;
  configSource: ConfigSource;
  rootDir: string;
};

export type CreateAppContextInput = {
  config: ProjectConfig;
  resolution: ConfigResolution;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  return {
    config: input.config,
    configPath: input.resolution.configPath,
    configSource: input.resolution.source,
    rootDir: input.config.root,
  };
}
