import type { AppContext } from "../app/context.js";
import { resolveTasks } from "../app/orchestrator/task-registry.js";
import { TaskRunner, type RunResult, type TaskFailure } from "../app/orchestrator/task-runner.js";
import {
  UserFacingError,
  USER_FACING_ERROR_CODES,
  VALIDATION_ERROR_CODES,
  ValidationError,
  type ValidationErrorCode,
} from "../core/errors.js";
import { buildLogCleanupPlan, executeLogCleanup } from "../core/log-cleanup.js";
import { JsonlLogger } from "../core/logger.js";
import { runLogPath } from "../core/paths.js";
import { discoverProjects, selectProjects, type Project } from "../core/projects.js";
import { defaultRunId } from "../core/utils.js";

export type CheckOptions = {
  projects?: string[];
  tasks?: string[];
  continueOnFailure?: boolean;
  cleanLogs?: boolean;
  runId?: string;
  debug?: boolean;
};

export async function checkCommand(
  appContext: AppContext,
  opts: CheckOptions = {},
): Promise<RunResult | null> {
  const { config } = appContext;
  const discovered = discoverProjects(config);
  const projects = selectProjects(discovered, opts.projects);
  const tasks = resolveTasks(config, opts.tasks);

  if (projects.length === 0) {
    console.log(`No projects found under ${appContext.rootDir}.`);
    return null;
  }

  const runId = opts.runId ?? defaultRunId();
  const logPath = runLogPath(config.logs.dir, runId);
  const logger = new JsonlLogger(logPath, { runId, debug: opts.debug });

  const runner = new TaskRunner({
    config,
    events: logger,
    workspaceProjects: discovered,
    failFast: opts.continueOnFailure ? false : config.fail_fast,
  });

  if (config.logs.clean_on_finish && opts.cleanLogs !== false) {
    runner.registerFinalizer("clean-logs", () => cleanProjectLogs(appContext, projects));
  }

  console.log(
    `Checking ${projects.length} project(s) with ${tasks.length} task(s) (run ${runId}).`,
  );

  let result: RunResult;
  try {
    result = await runner.run(projects, tasks);
  } finally {
    logger.close();
  }

  if (result.failures.length > 0) {
    throw createCheckFailedError(result, logPath);
  }

  console.log(`All ${result.outcomes.length} task run(s) passed.`);
  return result;
}

async function cleanProjectLogs(appContext: AppContext, projects: Project[]): Promise<void> {
  const { config } = appContext;
  const targets = buildLogCleanupPlan(projects, {
    patterns: config.logs.clean_patterns,
    ignoreDirs: config.ignore,
    protectedDirs: [config.logs.dir],
  });
  await executeLogCleanup(targets);
}

// =============================================================================
// ERROR NORMALIZATION
// =============================================================================

const CHECK_FAILED_TITLE = "Convention check failed.";

const VALIDATION_HINTS: Record<ValidationErrorCode, string> = {
  [VALIDATION_ERROR_CODES.missingRegisteredClass]:
    "Fix the class names listed in spring.factories or add the missing source files.",
  [VALIDATION_ERROR_CODES.missingProxyDeclaration]:
    'Annotate the class with @Configuration(value = "<name>", proxyBeanMethods = false).',
  [VALIDATION_ERROR_CODES.missingTestSuite]:
    "Add a single *TestsSuite class that lists the project's test classes.",
  [VALIDATION_ERROR_CODES.ambiguousTestSuite]: "Keep exactly one *TestsSuite class per project.",
  [VALIDATION_ERROR_CODES.incompleteTestSuite]:
    "Add the missing classes to the suite's class list.",
};

function createCheckFailedError(result: RunResult, logPath: string): UserFacingError {
  const [first] = result.failures;
  const suffix = result.stoppedEarly
    ? " Stopped at the first failure; rerun with --continue to see every failure."
    : "";

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.validation,
    title: CHECK_FAILED_TITLE,
    message: `${result.failures.length} of ${result.outcomes.length} task run(s) failed.${suffix}`,
    details: result.failures.map(describeFailure),
    hint: first ? resolveFailureHint(first) : undefined,
    next: `Event log: ${logPath}`,
    cause: first?.error,
  });
}

function describeFailure(failure: TaskFailure): string {
  const code = failure.error instanceof ValidationError ? failure.error.code : "TaskError";
  return `${failure.project.displayName} ${failure.task}: [${code}] ${failure.error.message}`;
}

function resolveFailureHint(failure: TaskFailure): string {
  if (failure.error instanceof ValidationError) {
    return VALIDATION_HINTS[failure.error.code];
  }
  return "Rerun with --debug for the underlying error.";
}
