import fs from "node:fs";
import path from "node:path";

import yaml from "js-yaml";
import type { ZodIssue } from "zod";

import { ProjectConfigSchema, type ProjectConfig } from "./config.js";
import { ConfigError, UserFacingError, USER_FACING_ERROR_CODES } from "./errors.js";
import { configBaseDir } from "./paths.js";

// =============================================================================
// ENV EXPANSION
// =============================================================================

type ExpandContext = {
  file: string;
  trail: string[];
};

function expandEnv(value: unknown, ctx: ExpandContext): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Z0-9_]+)\}/gi, (_match, varName: string) => {
      const envValue = process.env[varName];
      if (envValue === undefined) {
        const location = ctx.trail.length > 0 ? ctx.trail.join(".") : "<root>";
        throw new ConfigError(
          `Environment variable ${varName} is not set but is referenced in ${ctx.file} (${location}).`,
        );
      }
      return envValue;
    });
  }

  if (Array.isArray(value)) {
    return value.map((item, index) =>
      expandEnv(item, { ...ctx, trail: [...ctx.trail, `${index}`] }),
    );
  }

  if (value && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, expandEnv(v, { ...ctx, trail: [...ctx.trail, k] })]),
    );
  }

  return value;
}

// =============================================================================
// ERROR HELPERS
// =============================================================================

const MISSING_CONFIG_HINT =
  "Run `buildwarden init` in the workspace root or pass --config <path>.";
const INVALID_CONFIG_HINT =
  "Fix the config file and rerun. For a fresh config, run `buildwarden init --force`.";

type YamlErrorLocation = {
  line: number;
  column: number;
};

function resolveYamlErrorLocation(error: unknown): YamlErrorLocation | null {
  if (!error || typeof error !== "object" || !("mark" in error)) {
    return null;
  }

  const mark = error.mark;
  if (!mark || typeof mark !== "object" || !("line" in mark) || !("column" in mark)) {
    return null;
  }

  const { line, column } = mark;
  if (typeof line !== "number" || typeof column !== "number") {
    return null;
  }

  return { line: line + 1, column: column + 1 };
}

function formatIssues(issues: ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";

      if (issue.code === "invalid_type") {
        return `${location}: Expected ${issue.expected}, received ${issue.received}`;
      }
      if (issue.code === "unrecognized_keys") {
        return `${location}: Unrecognized keys: ${issue.keys.join(", ")}`;
      }

      return `${location}: ${issue.message}`;
    })
    .join("\n");
}

function createMissingConfigError(configPath: string): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Project config missing.",
    message: `Project config not found at ${configPath}.`,
    hint: MISSING_CONFIG_HINT,
  });
}

function createInvalidConfigError(cause: ConfigError): UserFacingError {
  // First line is the summary; any following lines are per-issue details.
  const [summary = cause.message, ...details] = cause.message.split("\n");

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Project config invalid.",
    message: summary.replace(/:$/, "."),
    details,
    hint: INVALID_CONFIG_HINT,
    cause,
  });
}

function throwNormalizedConfigError(error: unknown): never {
  if (error instanceof UserFacingError) {
    throw error;
  }

  if (error instanceof ConfigError) {
    throw createInvalidConfigError(error);
  }

  throw error;
}

// =============================================================================
// PUBLIC API
// =============================================================================

export function loadProjectConfig(configPath: string): ProjectConfig {
  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw createMissingConfigError(absolutePath);
  }

  try {
    let raw: string;
    try {
      raw = fs.readFileSync(absolutePath, "utf8");
    } catch (err) {
      throw new ConfigError(`Failed to read project config at ${absolutePath}`, err);
    }

    let doc: unknown;
    try {
      doc = yaml.load(raw);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      const location = resolveYamlErrorLocation(err);
      const locationDetail = location ? ` (line ${location.line}, column ${location.column})` : "";
      throw new ConfigError(
        `Failed to parse YAML config at ${absolutePath}${locationDetail}:\n${detail}`,
        err,
      );
    }

    // An empty file is a valid "all defaults" config.
    const expanded = expandEnv(doc ?? {}, { file: absolutePath, trail: [] });

    const parsed = ProjectConfigSchema.safeParse(expanded);
    if (!parsed.success) {
      const details = formatIssues(parsed.error.issues);
      throw new ConfigError(`Invalid project config at ${absolutePath}:\n${details}`, parsed.error);
    }

    return resolveConfigPaths(parsed.data, configBaseDir(absolutePath));
  } catch (err) {
    throwNormalizedConfigError(err);
  }
}

// Normalize root and logs.dir to absolute paths so every consumer sees the same tree.
export function resolveConfigPaths(config: ProjectConfig, baseDir: string): ProjectConfig {
  const root = path.resolve(baseDir, config.root);

  return {
    ...config,
    root,
    logs: {
      ...config.logs,
      dir: path.resolve(root, config.logs.dir),
    },
  };
}
