import path from "node:path";

// =============================================================================
// CONSTANTS
// =============================================================================

export const CONFIG_DIR_NAME = ".buildwarden";
export const CONFIG_FILE_NAME = "config.yaml";
export const DEFAULT_LOGS_DIR = `${CONFIG_DIR_NAME}/logs`;

// =============================================================================
// PATH HELPERS
// =============================================================================

export function repoConfigDir(rootDir: string): string {
  return path.join(rootDir, CONFIG_DIR_NAME);
}

export function repoConfigPath(rootDir: string): string {
  return path.join(repoConfigDir(rootDir), CONFIG_FILE_NAME);
}

// A config kept in <dir>/.buildwarden/config.yaml is anchored at <dir>; any
// other config file is anchored at its own directory.
export function configBaseDir(configPath: string): string {
  const configDir = path.dirname(path.resolve(configPath));
  return path.basename(configDir) === CONFIG_DIR_NAME ? path.dirname(configDir) : configDir;
}

export function runLogPath(logsDir: string, runId: string): string {
  return path.join(logsDir, `check-${runId}.jsonl`);
}
