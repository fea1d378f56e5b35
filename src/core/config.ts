import { z } from "zod";

import { DEFAULT_LOGS_DIR } from "./paths.js";

// =============================================================================
// CONSTANTS
// =============================================================================

export const DEFAULT_IGNORED_DIRS = [".git", "build", "target", "node_modules", "out", ".gradle"];

export const DEFAULT_CLEAN_PATTERNS = ["**/*.log", "**/*.gz", "**/*.log.gz", "**/*.orig"];

// =============================================================================
// SCHEMA
// =============================================================================

const LayoutSchema = z
  .object({
    main_sources: z.string().min(1).default("src/main/java"),
    main_resources: z.string().min(1).default("src/main/resources"),
    test_sources: z.string().min(1).default("src/test/java"),
  })
  .strict();

const ConfigFactoriesTaskSchema = z
  .object({
    enabled: z.boolean().default(true),
    // Relative to layout.main_resources.
    registration_file: z.string().min(1).default("META-INF/spring.factories"),
  })
  .strict();

const BeanProxyingTaskSchema = z
  .object({
    enabled: z.boolean().default(true),
    class_suffix: z.string().min(1).default("Configuration"),
    // Relative to the project root.
    scan_root: z.string().min(1).default("."),
  })
  .strict();

const TestSuitesTaskSchema = z
  .object({
    enabled: z.boolean().default(true),
  })
  .strict();

const TasksSchema = z
  .object({
    "verify-config-factories": ConfigFactoriesTaskSchema.default({}),
    "verify-bean-proxying": BeanProxyingTaskSchema.default({}),
    "validate-test-suites": TestSuitesTaskSchema.default({}),
  })
  .strict();

const LogsSchema = z
  .object({
    dir: z.string().min(1).default(DEFAULT_LOGS_DIR),
    clean_patterns: z.array(z.string().min(1)).default(DEFAULT_CLEAN_PATTERNS),
    clean_on_finish: z.boolean().default(true),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    root: z.string().min(1).default("."),
    // Explicit project directories relative to root; omitted means discovery.
    projects: z.array(z.string().min(1)).min(1).optional(),
    ignore: z.array(z.string().min(1)).default(DEFAULT_IGNORED_DIRS),
    source_extension: z
      .string()
      .regex(/^\w+$/, "must be a bare extension such as java or kt")
      .default("java"),
    layout: LayoutSchema.default({}),
    fail_fast: z.boolean().default(true),
    tasks: TasksSchema.default({}),
    logs: LogsSchema.default({}),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type TaskName = keyof z.infer<typeof TasksSchema>;

/** Defaults for a workspace that has no config file. */
export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}
