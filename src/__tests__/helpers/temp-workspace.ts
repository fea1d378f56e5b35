import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import fse from "fs-extra";

import { createProject, type Project } from "../../core/projects.js";

// =============================================================================
// TEMP WORKSPACES
// =============================================================================

export type TempWorkspace = {
  root: string;
  write(files: Record<string, string>): void;
  project(relativeDir?: string): Project;
  cleanup(): Promise<void>;
};

export function createTempWorkspace(prefix = "buildwarden-"): TempWorkspace {
  // realpath so assertions match the canonical paths the validators report.
  const root = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));

  return {
    root,
    write(files) {
      for (const [relativePath, contents] of Object.entries(files)) {
        fse.outputFileSync(path.join(root, relativePath), contents, "utf8");
      }
    },
    project(relativeDir = ".") {
      const dir = path.join(root, relativeDir);
      fse.ensureDirSync(dir);
      return createProject(dir, root);
    },
    async cleanup() {
      await fse.remove(root);
    },
  };
}

// =============================================================================
// JAVA SOURCES
// =============================================================================

export function javaClass(packageName: string, className: string, body = ""): string {
  return `package ${packageName};\n\npublic class ${className} {\n${body}}\n`;
}

// =============================================================================
// ASSERTION HELPERS
// =============================================================================

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("Expected function to throw");
}
