/*
Purpose: find the projects of a workspace and give each a stable name.
Assumptions: a project is a directory with src/main and/or src/test under it.
Usage: const projects = selectProjects(discoverProjects(config), opts.project);
*/

import fs from "node:fs";
import path from "node:path";

import fg from "fast-glob";
import { minimatch } from "minimatch";

import type { ProjectConfig } from "./config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { CONFIG_DIR_NAME } from "./paths.js";
import { isInsideDir, toPosixPath } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type Project = {
  /** Path relative to the workspace root (posix), or the root's basename. */
  name: string;
  displayName: string;
  /** Canonical root path with symlinks resolved. */
  rootDir: string;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createProject(projectDir: string, workspaceRoot: string): Project {
  const rootDir = fs.realpathSync(projectDir);
  const relative = toPosixPath(path.relative(fs.realpathSync(workspaceRoot), rootDir));
  const name = relative === "" ? path.basename(rootDir) : relative;

  return { name, displayName: `project '${name}'`, rootDir };
}

export function discoverProjects(config: ProjectConfig): Project[] {
  const root = config.root;
  if (!fs.existsSync(root)) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Workspace root missing.",
      message: `Workspace root ${root} does not exist.`,
      hint: "Check the `root` setting of the buildwarden config.",
    });
  }

  const dirs = config.projects
    ? config.projects.map((entry) => resolveExplicitProject(root, entry))
    : findProjectDirs(root, config.ignore);

  return dirs
    .map((dir) => createProject(dir, root))
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function selectProjects(projects: Project[], patterns?: string[]): Project[] {
  if (!patterns || patterns.length === 0) {
    return projects;
  }

  const selected = projects.filter((project) =>
    patterns.some((pattern) => minimatch(project.name, pattern, { dot: true })),
  );

  if (selected.length === 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "No matching projects.",
      message: `No project matches ${patterns.map((p) => JSON.stringify(p)).join(", ")}.`,
      hint: "Run `buildwarden show-config` to list the discovered projects.",
    });
  }

  return selected;
}

/** Root dirs of the projects that sit inside `project`'s tree. */
export function nestedProjectRoots(project: Project, projects: Project[]): string[] {
  return projects
    .filter((other) => isInsideDir(project.rootDir, other.rootDir))
    .map((other) => other.rootDir);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveExplicitProject(root: string, entry: string): string {
  const dir = path.resolve(root, entry);
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Project directory missing.",
      message: `Configured project ${JSON.stringify(entry)} is not a directory under ${root}.`,
      hint: "Fix the `projects` list of the buildwarden config.",
    });
  }
  return dir;
}

function findProjectDirs(root: string, ignoredDirs: string[]): string[] {
  const matches = fg.sync(["**/src/main", "**/src/test"], {
    cwd: root,
    onlyDirectories: true,
    dot: true,
    followSymbolicLinks: false,
    ignore: [...ignoredDirs, CONFIG_DIR_NAME].map((dir) => `**/${dir}/**`),
  });

  const candidates = Array.from(
    new Set(matches.map((match) => path.resolve(root, path.dirname(path.dirname(match))))),
  ).sort((a, b) => a.length - b.length);

  // A src/main nested in another project's sources (fixtures, generated code) is not a project.
  const kept: string[] = [];
  for (const candidate of candidates) {
    const nested = kept.some((dir) => isInsideDir(path.join(dir, "src"), candidate));
    if (!nested) kept.push(candidate);
  }

  return kept;
}
