import type { AppContext } from "../app/context.js";
import { TASK_DEFINITIONS } from "../app/orchestrator/task-registry.js";

export function listTasksCommand(appContext: AppContext): void {
  const width = Math.max(...TASK_DEFINITIONS.map((task) => task.name.length));

  for (const task of TASK_DEFINITIONS) {
    const enabled = appContext.config.tasks[task.name].enabled;
    const suffix = enabled ? "" : " (disabled)";
    console.log(`${task.name.padEnd(width)}  ${task.description}${suffix}`);
  }
}
