/**
 * Task registry maps task names to the validators they run.
 * Purpose: give every validator a stable name, description and config binding.
 * Assumptions: tasks are independent; order here is the execution order per project.
 * Usage: const tasks = resolveTasks(config, opts.tasks);
 */

import path from "node:path";

import type { ProjectConfig, TaskName } from "../../core/config.js";
import { UserFacingError, USER_FACING_ERROR_CODES } from "../../core/errors.js";
import { nestedProjectRoots, type Project } from "../../core/projects.js";
import {
  verifyBeanProxyDeclarations,
  VALIDATOR_NAME as BEAN_PROXY_VALIDATOR_NAME,
} from "../../validators/bean-proxy-validator.js";
import {
  verifyConfigFactories,
  VALIDATOR_NAME as CONFIG_FACTORIES_VALIDATOR_NAME,
} from "../../validators/config-factories-validator.js";
import type { ReportSink, ValidatorSummary } from "../../validators/lib/types.js";
import type { SelfInvocationDetector } from "../../validators/self-invocation-detector.js";
import {
  validateTestSuites,
  VALIDATOR_NAME as TEST_SUITE_VALIDATOR_NAME,
} from "../../validators/test-suite-validator.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskRunContext = {
  config: ProjectConfig;
  /** Every project of the workspace, selected or not. */
  workspaceProjects: Project[];
  report: ReportSink;
  detector?: SelfInvocationDetector;
};

export type TaskDefinition = {
  name: TaskName;
  description: string;
  run(project: Project, ctx: TaskRunContext): ValidatorSummary;
};

// =============================================================================
// TASKS
// =============================================================================

export const TASK_DEFINITIONS: readonly TaskDefinition[] = [
  {
    name: CONFIG_FACTORIES_VALIDATOR_NAME,
    description:
      "Examine spring.factories and ensure registered @Configuration classes can be located",
    run: (project, { config }) =>
      verifyConfigFactories({
        project,
        sourceExtension: config.source_extension,
        mainSourcesDir: config.layout.main_sources,
        registrationFile: path.join(
          config.layout.main_resources,
          config.tasks[CONFIG_FACTORIES_VALIDATOR_NAME].registration_file,
        ),
      }),
  },
  {
    name: BEAN_PROXY_VALIDATOR_NAME,
    description:
      "Examine @Configuration classes and check whether proxying bean methods is declared",
    run: (project, { config, workspaceProjects, detector }) => {
      const task = config.tasks[BEAN_PROXY_VALIDATOR_NAME];
      return verifyBeanProxyDeclarations({
        project,
        sourceExtension: config.source_extension,
        scanRoot: task.scan_root,
        classSuffix: task.class_suffix,
        ignoreDirs: config.ignore,
        nestedProjectDirs: nestedProjectRoots(project, workspaceProjects),
        detector,
      });
    },
  },
  {
    name: TEST_SUITE_VALIDATOR_NAME,
    description: "Ensure every project has one tests suite that references all test classes",
    run: (project, { config, report }) =>
      validateTestSuites({
        project,
        sourceExtension: config.source_extension,
        testSourcesDir: config.layout.test_sources,
        report,
      }),
  },
];

// =============================================================================
// PUBLIC API
// =============================================================================

export function isTaskName(value: string): value is TaskName {
  return TASK_DEFINITIONS.some((task) => task.name === value);
}

/**
 * Explicitly requested tasks run even when disabled in config; otherwise every
 * enabled task runs. Registry order is kept either way.
 */
export function resolveTasks(config: ProjectConfig, requested?: string[]): TaskDefinition[] {
  if (!requested || requested.length === 0) {
    return TASK_DEFINITIONS.filter((task) => config.tasks[task.name].enabled);
  }

  const unknown = requested.filter((name) => !isTaskName(name));
  if (unknown.length > 0) {
    throw new UserFacingError({
      code: USER_FACING_ERROR_CODES.usage,
      title: "Unknown task.",
      message: `Unknown task name(s): ${unknown.join(", ")}.`,
      hint: "Run `buildwarden list-tasks` to see the available tasks.",
    });
  }

  const wanted = new Set(requested);
  return TASK_DEFINITIONS.filter((task) => wanted.has(task.name));
}
