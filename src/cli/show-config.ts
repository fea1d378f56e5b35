import yaml from "js-yaml";

import type { AppContext } from "../app/context.js";
import { discoverProjects } from "../core/projects.js";

export function showConfigCommand(appContext: AppContext): void {
  const source =
    appContext.configPath === null
      ? "built-in defaults (no config file found)"
      : `${appContext.configPath} (${appContext.configSource})`;

  console.log(`# Config: ${source}`);
  console.log(yaml.dump(appContext.config, { lineWidth: 100 }).trimEnd());

  const projects = discoverProjects(appContext.config);
  console.log("");
  console.log(`# Projects (${projects.length})`);
  for (const project of projects) {
    console.log(`- ${project.name}: ${project.rootDir}`);
  }
}
