import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadConfigForCli } from "../cli/config.js";
import { CONFIG_ENV_VAR } from "../core/config-discovery.js";

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

function makeDir(): string {
  const dir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), "app-context-")));
  tempDirs.push(dir);
  return dir;
}

function writeFile(filePath: string, contents: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, contents, "utf8");
}

// =============================================================================
// TESTS
// =============================================================================

describe("loadConfigForCli", () => {
  it("runs on defaults rooted at cwd without a config file", async () => {
    const cwd = makeDir();

    const ctx = await loadConfigForCli({ cwd });

    expect(ctx.configPath).toBeNull();
    expect(ctx.configSource).toBe("defaults");
    expect(ctx.rootDir).toBe(cwd);
    expect(ctx.config.logs.dir).toBe(path.join(cwd, ".buildwarden", "logs"));
  });

  it("loads the nearest repo config", async () => {
    const root = makeDir();
    const configPath = path.join(root, ".buildwarden", "config.yaml");
    writeFile(configPath, "source_extension: kt\n");
    const nested = path.join(root, "core", "src");
    fs.mkdirSync(nested, { recursive: true });

    const ctx = await loadConfigForCli({ cwd: nested });

    expect(ctx.configPath).toBe(configPath);
    expect(ctx.configSource).toBe("repo");
    expect(ctx.rootDir).toBe(root);
    expect(ctx.config.source_extension).toBe("kt");
  });

  it("honors the config environment variable", async () => {
    const dir = makeDir();
    const configPath = path.join(dir, "ci", "buildwarden.yaml");
    writeFile(configPath, "root: ..\nfail_fast: false\n");
    process.env[CONFIG_ENV_VAR] = configPath;

    const ctx = await loadConfigForCli({ cwd: makeDir() });

    expect(ctx.configSource).toBe("env");
    expect(ctx.rootDir).toBe(dir);
    expect(ctx.config.fail_fast).toBe(false);
  });
});
