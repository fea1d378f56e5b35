import fs from "node:fs";
import path from "node:path";

import fg from "fast-glob";
import fse from "fs-extra";

import type { Project } from "./projects.js";
import { isInsideDir } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type LogCleanupTarget = {
  project: string;
  path: string;
};

export type BuildLogCleanupPlanOptions = {
  patterns: string[];
  /** Directory names never descended into. */
  ignoreDirs?: string[];
  /** Absolute directories whose contents are always kept (the buildwarden logs dir). */
  protectedDirs?: string[];
};

export type ExecuteLogCleanupOptions = {
  dryRun?: boolean;
  log?: (message: string) => void;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function buildLogCleanupPlan(
  projects: Project[],
  opts: BuildLogCleanupPlanOptions,
): LogCleanupTarget[] {
  const seen = new Set<string>();
  const targets: LogCleanupTarget[] = [];
  const protectedDirs = (opts.protectedDirs ?? []).map(canonicalDir);

  for (const project of projects) {
    const matches = fg.sync(opts.patterns, {
      cwd: project.rootDir,
      absolute: true,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      ignore: (opts.ignoreDirs ?? []).map((dir) => `**/${dir}/**`),
    });

    for (const match of matches.map((file) => path.normalize(file)).sort()) {
      // Nested projects share files with their parent; remove each file once.
      if (seen.has(match)) continue;
      if (protectedDirs.some((dir) => isInsideDir(dir, match))) continue;

      assertInsideBase(match, project.rootDir);
      seen.add(match);
      targets.push({ project: project.name, path: match });
    }
  }

  return targets;
}

export async function executeLogCleanup(
  targets: LogCleanupTarget[],
  opts: ExecuteLogCleanupOptions = {},
): Promise<string[]> {
  const log = opts.log ?? (() => undefined);
  const removed: string[] = [];

  for (const target of targets) {
    if (opts.dryRun) {
      log(`[dry-run] Would remove ${target.path}`);
      continue;
    }

    await fse.remove(target.path);
    removed.push(target.path);
    log(`Removed ${target.path}`);
  }

  return removed;
}

// =============================================================================
// INTERNALS
// =============================================================================

// Project roots are realpaths, so protected dirs must be compared the same way.
function canonicalDir(dir: string): string {
  const resolved = path.resolve(dir);
  return fs.existsSync(resolved) ? fs.realpathSync(resolved) : resolved;
}

function assertInsideBase(targetPath: string, baseDir: string): void {
  if (!isInsideDir(baseDir, targetPath)) {
    throw new Error(`Refusing to remove file outside ${baseDir}: ${targetPath}`);
  }
}
