import type { AppContext } from "../app/context.js";
import { buildLogCleanupPlan, executeLogCleanup } from "../core/log-cleanup.js";
import { discoverProjects, selectProjects } from "../core/projects.js";

type CleanLogsOptions = {
  projects?: string[];
  dryRun?: boolean;
};

export async function cleanLogsCommand(
  appContext: AppContext,
  opts: CleanLogsOptions = {},
): Promise<string[]> {
  const { config } = appContext;
  const projects = selectProjects(discoverProjects(config), opts.projects);

  const targets = buildLogCleanupPlan(projects, {
    patterns: config.logs.clean_patterns,
    ignoreDirs: config.ignore,
    protectedDirs: [config.logs.dir],
  });

  if (targets.length === 0) {
    console.log(`No log files to clean in ${projects.length} project(s).`);
    return [];
  }

  const removed = await executeLogCleanup(targets, {
    dryRun: opts.dryRun,
    log: (msg) => console.log(msg),
  });

  if (opts.dryRun) {
    console.log(`Dry run only. ${targets.length} file(s) would be removed.`);
  } else {
    console.log(`Removed ${removed.length} file(s).`);
  }

  return removed;
}
