import { createAppContext, type AppContext } from "../app/context.js";
import { defaultProjectConfig } from "../core/config.js";
import { resolveProjectConfigPath } from "../core/config-discovery.js";
import { loadProjectConfig, resolveConfigPaths } from "../core/config-loader.js";

// =============================================================================
// CONFIG DISCOVERY (CLI)
//
// Order: --config, then $BUILDWARDEN_CONFIG, then the nearest
// .buildwarden/config.yaml above cwd, then built-in defaults rooted at cwd.
// =============================================================================

export type LoadConfigForCliArgs = {
  explicitConfigPath?: string;
  cwd?: string;
};

export async function loadConfigForCli(args: LoadConfigForCliArgs = {}): Promise<AppContext> {
  const resolution = resolveProjectConfigPath({
    explicitPath: args.explicitConfigPath,
    cwd: args.cwd,
  });

  const config =
    resolution.source === "defaults"
      ? resolveConfigPaths(defaultProjectConfig(), resolution.rootDir)
      : loadProjectConfig(resolution.configPath);

  return createAppContext({ config, resolution });
}
