/**
 * TaskRunner executes named tasks for every selected project.
 * Purpose: one place for fail-fast policy, event logging and guaranteed finalizers.
 * Assumptions: tasks are synchronous and throw ValidationError on a convention violation.
 * Usage: runner.registerFinalizer(name, fn); const result = await runner.run(projects, tasks);
 */

import type { ProjectConfig, TaskName } from "../../core/config.js";
import { formatErrorMessage } from "../../core/error-format.js";
import { TaskError, ValidationError } from "../../core/errors.js";
import { logTaskEvent, type EventSink, type JsonObject } from "../../core/logger.js";
import type { Project } from "../../core/projects.js";
import type { ReportSink, ValidatorSummary } from "../../validators/lib/types.js";
import type { SelfInvocationDetector } from "../../validators/self-invocation-detector.js";

import type { TaskDefinition } from "./task-registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type TaskOutcome =
  | { status: "pass"; project: Project; task: TaskName; summary: ValidatorSummary }
  | { status: "fail"; project: Project; task: TaskName; error: ValidationError | TaskError };

export type TaskFailure = Extract<TaskOutcome, { status: "fail" }>;

export type Finalizer = {
  name: string;
  run: () => void | Promise<void>;
};

export type FinalizerFailure = {
  name: string;
  error: unknown;
};

export type RunResult = {
  outcomes: TaskOutcome[];
  failures: TaskFailure[];
  finalizerFailures: FinalizerFailure[];
  /** True when fail-fast skipped remaining tasks. */
  stoppedEarly: boolean;
};

export type TaskRunnerOptions = {
  config: ProjectConfig;
  events: EventSink;
  failFast: boolean;
  /** All discovered projects; defaults to the ones passed to run(). */
  workspaceProjects?: Project[];
  /** Validator diagnostics (e.g. the missing test classes). Defaults to console.log. */
  report?: ReportSink;
  /** Progress lines. Defaults to console.log. */
  log?: (message: string) => void;
  detector?: SelfInvocationDetector;
};

// =============================================================================
// RUNNER
// =============================================================================

export class TaskRunner {
  private readonly finalizers: Finalizer[] = [];
  private readonly log: (message: string) => void;
  private readonly report: ReportSink;

  constructor(private readonly options: TaskRunnerOptions) {
    this.log = options.log ?? ((message) => console.log(message));
    this.report = options.report ?? ((line) => console.log(line));
  }

  /** Finalizers run once per run(), in registration order, whatever the outcome. */
  registerFinalizer(name: string, run: Finalizer["run"]): void {
    this.finalizers.push({ name, run });
  }

  async run(projects: Project[], tasks: TaskDefinition[]): Promise<RunResult> {
    const outcomes: TaskOutcome[] = [];
    const workspaceProjects = this.options.workspaceProjects ?? projects;
    let stoppedEarly = false;
    let finalizerFailures: FinalizerFailure[] = [];

    logTaskEvent(this.options.events, "run.start", {
      payload: {
        projects: projects.map((p) => p.name),
        tasks: tasks.map((t) => t.name),
        fail_fast: this.options.failFast,
      },
    });

    try {
      for (const project of projects) {
        for (const task of tasks) {
          const outcome = this.runTask(project, task, workspaceProjects);
          outcomes.push(outcome);

          if (outcome.status === "fail" && this.options.failFast) {
            stoppedEarly = true;
            break;
          }
        }
        if (stoppedEarly) break;
      }
    } finally {
      finalizerFailures = await this.runFinalizers();
    }

    const failures = outcomes.filter((o): o is TaskFailure => o.status === "fail");

    logTaskEvent(this.options.events, "run.complete", {
      payload: {
        status: failures.length === 0 ? "pass" : "fail",
        tasks_run: outcomes.length,
        failures: failures.length,
        stopped_early: stoppedEarly,
      },
    });

    return { outcomes, failures, finalizerFailures, stoppedEarly };
  }

  private runTask(
    project: Project,
    task: TaskDefinition,
    workspaceProjects: Project[],
  ): TaskOutcome {
    const fields = { project: project.name, task: task.name };
    logTaskEvent(this.options.events, "task.start", fields);

    try {
      const summary = task.run(project, {
        config: this.options.config,
        workspaceProjects,
        report: this.report,
        detector: this.options.detector,
      });

      logTaskEvent(this.options.events, "task.pass", { ...fields, payload: summary });
      this.log(`[pass] ${project.displayName} ${task.name}`);
      return { status: "pass", project, task: task.name, summary };
    } catch (err) {
      const error =
        err instanceof ValidationError
          ? err
          : new TaskError(`Task ${task.name} crashed: ${formatErrorMessage(err)}`, err);

      logTaskEvent(this.options.events, "task.fail", {
        ...fields,
        payload: describeFailure(error),
      });
      this.log(`[fail] ${project.displayName} ${task.name}: ${error.message}`);
      return { status: "fail", project, task: task.name, error };
    }
  }

  private async runFinalizers(): Promise<FinalizerFailure[]> {
    const failures: FinalizerFailure[] = [];

    for (const finalizer of this.finalizers) {
      try {
        await finalizer.run();
        logTaskEvent(this.options.events, "finalizer.done", { task: finalizer.name });
      } catch (error) {
        failures.push({ name: finalizer.name, error });
        logTaskEvent(this.options.events, "finalizer.fail", {
          task: finalizer.name,
          payload: { message: formatErrorMessage(error) },
        });
        this.log(`[warn] finalizer ${finalizer.name} failed: ${formatErrorMessage(error)}`);
      }
    }

    return failures;
  }
}

// =============================================================================
// INTERNALS
// =============================================================================

function describeFailure(error: ValidationError | TaskError): JsonObject {
  if (error instanceof ValidationError) {
    return { code: error.code, message: error.message };
  }
  return { code: "TaskError", message: error.message };
}
