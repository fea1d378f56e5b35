// Validators shared file helpers.
// Purpose: enumerate and read source files for the regex-based validators.
// Assumes callers filter by file name; no file handle outlives a single read.

import fs from "node:fs";
import path from "node:path";

import fg from "fast-glob";

import { isInsideDir, toPosixPath } from "../../core/utils.js";

import type { SourceFile } from "./types.js";

// =============================================================================
// LISTING
// =============================================================================

export type ListSourceFilesOptions = {
  extension: string;
  /** Directory names skipped at any depth. */
  ignoreDirs?: string[];
  /** Absolute directories skipped with everything below them. */
  excludeDirs?: string[];
};

/** Absolute paths of every `*.<extension>` file under rootDir, sorted. */
export function listSourceFiles(rootDir: string, opts: ListSourceFilesOptions): string[] {
  if (!fs.existsSync(rootDir)) {
    return [];
  }

  return fg
    .sync(`**/*.${opts.extension}`, {
      cwd: rootDir,
      absolute: true,
      onlyFiles: true,
      dot: true,
      followSymbolicLinks: false,
      ignore: [
        ...(opts.ignoreDirs ?? []).map((dir) => `**/${dir}/**`),
        ...excludedSubtrees(rootDir, opts.excludeDirs ?? []),
      ],
    })
    .map((file) => path.normalize(file))
    .sort();
}

// Only directories strictly below rootDir can be excluded; fast-glob ignores are relative to cwd.
function excludedSubtrees(rootDir: string, dirs: string[]): string[] {
  return dirs
    .filter((dir) => isInsideDir(rootDir, dir))
    .map((dir) => `${fg.escapePath(toPosixPath(path.relative(rootDir, dir)))}/**`);
}

export function filterByFileName(files: string[], pattern: RegExp): string[] {
  return files.filter((file) => pattern.test(path.basename(file)));
}

// =============================================================================
// READING
// =============================================================================

export function readSourceFile(filePath: string): SourceFile {
  return { path: filePath, text: fs.readFileSync(filePath, "utf8") };
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
