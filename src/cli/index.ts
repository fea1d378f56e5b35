import { Command } from "commander";

import type { AppContext } from "../app/context.js";

import { checkCommand } from "./check.js";
import { cleanLogsCommand } from "./clean-logs.js";
import { loadConfigForCli } from "./config.js";
import { initCommand } from "./init.js";
import { listTasksCommand } from "./list-tasks.js";
import { showConfigCommand } from "./show-config.js";

type GlobalOptions = {
  config?: string;
  debug?: boolean;
};

type CheckCliOptions = {
  project?: string[];
  tasks?: string[];
  continue: boolean;
  cleanLogs: boolean;
};

type CleanLogsCliOptions = {
  project?: string[];
  dryRun: boolean;
};

function parseCommaList(value: string): string[] {
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = async (): Promise<AppContext> => {
    const globals = program.opts<GlobalOptions>();
    return loadConfigForCli({ explicitConfigPath: globals.config });
  };

  program
    .name("buildwarden")
    .description("Convention checks for JVM/Spring multi-project source trees")
    .version("0.1.0")
    .option(
      "--config <path>",
      "Override config path (defaults to the nearest .buildwarden/config.yaml)",
    )
    .option("--debug", "Show error details and stack traces", false);

  program
    .command("check")
    .description("Run convention tasks for every project (fail-fast by default)")
    .option("--project <pattern...>", "Only check projects whose name matches a glob")
    .option("--tasks <names>", "Comma-separated task names to run", parseCommaList)
    .option("--continue", "Keep going after a failing task and report every failure", false)
    .option("--no-clean-logs", "Skip the log cleanup that runs after the tasks")
    .action(async (opts: CheckCliOptions) => {
      const appContext = await resolveContext();
      await checkCommand(appContext, {
        projects: opts.project,
        tasks: opts.tasks,
        continueOnFailure: opts.continue,
        cleanLogs: opts.cleanLogs,
        debug: program.opts<GlobalOptions>().debug,
      });
    });

  program
    .command("list-tasks")
    .description("List the available tasks")
    .action(async () => {
      listTasksCommand(await resolveContext());
    });

  program
    .command("clean-logs")
    .description("Delete build log files (*.log, *.gz, *.orig) from projects")
    .option("--project <pattern...>", "Only clean projects whose name matches a glob")
    .option("--dry-run", "List files without deleting them", false)
    .action(async (opts: CleanLogsCliOptions) => {
      await cleanLogsCommand(await resolveContext(), {
        projects: opts.project,
        dryRun: opts.dryRun,
      });
    });

  program
    .command("show-config")
    .description("Print the resolved configuration and discovered projects")
    .action(async () => {
      showConfigCommand(await resolveContext());
    });

  program
    .command("init")
    .description("Write a default .buildwarden/config.yaml in the current directory")
    .option("--force", "Overwrite an existing config", false)
    .action(async (opts: { force: boolean }) => {
      await initCommand({ force: opts.force });
    });

  return program;
}
