import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { initCommand } from "../cli/init.js";

describe("acceptance: buildwarden init", () => {
  let repoDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    repoDir = await fs.mkdtemp(path.join(os.tmpdir(), "buildwarden-init-"));

    logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(repoDir, { recursive: true, force: true });
  });

  it("creates the repo-local config on first run", async () => {
    await initCommand({ force: false, cwd: repoDir });

    expect(errorSpy).not.toHaveBeenCalled();

    const configPath = path.join(repoDir, ".buildwarden", "config.yaml");
    const config = await fs.readFile(configPath, "utf8");
    expect(config).toContain("# buildwarden configuration");
    expect(config).toContain("registration_file: META-INF/spring.factories");
    expect(config).toContain("class_suffix: Configuration");
    expect(config).toContain("clean_on_finish: true");

    expect(logSpy.mock.calls.map((call) => call[0])).toEqual([
      `Created buildwarden config at ${configPath}`,
      "Run `buildwarden show-config` to see the projects it finds.",
    ]);
  });

  it("does not overwrite existing config unless --force is provided", async () => {
    await initCommand({ force: false, cwd: repoDir });

    const configPath = path.join(repoDir, ".buildwarden", "config.yaml");
    const original = await fs.readFile(configPath, "utf8");

    const marker = "# user edited\n";
    await fs.writeFile(configPath, `${marker}${original}`, "utf8");

    logSpy.mockClear();
    await initCommand({ force: false, cwd: repoDir });

    const afterNoForce = await fs.readFile(configPath, "utf8");
    expect(afterNoForce.startsWith(marker)).toBe(true);
    expect(logSpy).toHaveBeenCalledWith(
      `Config already exists at ${configPath}. Use --force to overwrite.`,
    );

    logSpy.mockClear();
    await initCommand({ force: true, cwd: repoDir });

    const afterForce = await fs.readFile(configPath, "utf8");
    expect(afterForce).toBe(original);

    const logs = logSpy.mock.calls.flat().join("\n");
    expect(logs).toMatch(/Overwrote buildwarden config/);
  });
});
