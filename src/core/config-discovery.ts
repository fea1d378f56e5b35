import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { CONFIG_DIR_NAME, repoConfigPath } from "./paths.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const CONFIG_ENV_VAR = "BUILDWARDEN_CONFIG";

const DEFAULT_CONFIG_TEMPLATE = `# buildwarden configuration
# Paths are relative to the directory that holds ${CONFIG_DIR_NAME}/.

root: .

# List project directories explicitly, or leave unset to discover every
# directory that has src/main or src/test.
# projects:
#   - core
#   - services/billing

source_extension: java

layout:
  main_sources: src/main/java
  main_resources: src/main/resources
  test_sources: src/test/java

# Stop at the first failing task (override with \`check --continue\`).
fail_fast: true

tasks:
  verify-config-factories:
    enabled: true
    registration_file: META-INF/spring.factories
  verify-bean-proxying:
    enabled: true
    class_suffix: Configuration
    scan_root: .
  validate-test-suites:
    enabled: true

logs:
  dir: ${CONFIG_DIR_NAME}/logs
  clean_patterns: ["**/*.log", "**/*.gz", "**/*.log.gz", "**/*.orig"]
  clean_on_finish: true
`;

// =============================================================================
// TYPES
// =============================================================================

export type ConfigSource = "explicit" | "env" | "repo" | "defaults";

export type ConfigResolution =
  | { source: "explicit" | "env" | "repo"; configPath: string }
  | { source: "defaults"; configPath: null; rootDir: string };

export type InitResult = {
  configPath: string;
  status: "created" | "exists" | "overwritten";
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function resolveProjectConfigPath(args: {
  explicitPath?: string;
  cwd?: string;
}): ConfigResolution {
  const cwd = args.cwd ?? process.cwd();

  if (args.explicitPath) {
    return { source: "explicit", configPath: path.resolve(cwd, args.explicitPath) };
  }

  const fromEnv = process.env[CONFIG_ENV_VAR];
  if (fromEnv && fromEnv.length > 0) {
    return { source: "env", configPath: path.resolve(cwd, fromEnv) };
  }

  const found = findRepoConfig(cwd);
  if (found) {
    return { source: "repo", configPath: found };
  }

  return { source: "defaults", configPath: null, rootDir: path.resolve(cwd) };
}

export function findRepoConfig(startDir: string): string | null {
  let current = path.resolve(startDir);
  while (true) {
    const candidate = repoConfigPath(current);
    if (fs.existsSync(candidate)) {
      return candidate;
    }

    const parent = path.dirname(current);
    if (parent === current) return null;
    current = parent;
  }
}

export function initRepoConfig(args: { cwd?: string; force?: boolean }): InitResult {
  const cwd = path.resolve(args.cwd ?? process.cwd());
  const configPath = repoConfigPath(cwd);
  const hasConfig = fs.existsSync(configPath);
  const force = args.force ?? false;

  if (hasConfig && !force) {
    return { configPath, status: "exists" };
  }

  fse.outputFileSync(configPath, DEFAULT_CONFIG_TEMPLATE, "utf8");

  return { configPath, status: hasConfig ? "overwritten" : "created" };
}
