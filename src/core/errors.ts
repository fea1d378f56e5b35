export class BuildWardenError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "BuildWardenError";
  }
}

export class ConfigError extends BuildWardenError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class TaskError extends BuildWardenError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "TaskError";
  }
}

// =============================================================================
// VALIDATION ERRORS
// =============================================================================

export const VALIDATION_ERROR_CODES = {
  missingRegisteredClass: "MissingRegisteredClass",
  missingProxyDeclaration: "MissingProxyDeclaration",
  missingTestSuite: "MissingTestSuite",
  ambiguousTestSuite: "AmbiguousTestSuite",
  incompleteTestSuite: "IncompleteTestSuite",
} as const;

export type ValidationErrorCode =
  (typeof VALIDATION_ERROR_CODES)[keyof typeof VALIDATION_ERROR_CODES];

export abstract class ValidationError extends BuildWardenError {
  abstract readonly code: ValidationErrorCode;

  constructor(
    message: string,
    public readonly project: string,
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export type MissingRegisteredClass = {
  className: string;
  expectedPath: string;
};

export class MissingRegisteredClassError extends ValidationError {
  readonly code = VALIDATION_ERROR_CODES.missingRegisteredClass;

  constructor(
    project: string,
    public readonly missing: MissingRegisteredClass[],
  ) {
    super(describeMissingRegisteredClasses(missing), project);
    this.name = "MissingRegisteredClassError";
  }
}

export class MissingProxyDeclarationError extends ValidationError {
  readonly code = VALIDATION_ERROR_CODES.missingProxyDeclaration;

  constructor(
    project: string,
    public readonly files: string[],
  ) {
    super(describeMissingProxyDeclarations(files), project);
    this.name = "MissingProxyDeclarationError";
  }
}

export class MissingTestSuiteError extends ValidationError {
  readonly code = VALIDATION_ERROR_CODES.missingTestSuite;

  constructor(
    project: string,
    public readonly testClassCount: number,
  ) {
    super(
      `Project ${project} is missing a TestsSuite class, while it contains ${testClassCount} tests`,
      project,
    );
    this.name = "MissingTestSuiteError";
  }
}

export class AmbiguousTestSuiteError extends ValidationError {
  readonly code = VALIDATION_ERROR_CODES.ambiguousTestSuite;

  constructor(
    project: string,
    public readonly suiteFiles: string[],
  ) {
    super(`Project ${project} has more than one TestsSuite`, project);
    this.name = "AmbiguousTestSuiteError";
  }
}

export class IncompleteTestSuiteError extends ValidationError {
  readonly code = VALIDATION_ERROR_CODES.incompleteTestSuite;

  constructor(
    project: string,
    public readonly suiteFile: string,
    public readonly missingClasses: string[],
  ) {
    super(`Found ${missingClasses.length} missing test class(es) in test suites`, project);
    this.name = "IncompleteTestSuiteError";
  }
}

function describeMissingRegisteredClasses(missing: MissingRegisteredClass[]): string {
  const [first] = missing;
  if (!first) return "Spring configuration class does not exist";

  const more = missing.length > 1 ? ` (and ${missing.length - 1} more)` : "";
  return `Spring configuration class does not exist: ${first.expectedPath}${more}`;
}

function describeMissingProxyDeclarations(files: string[]): string {
  const names = files.map((file) => file.split(/[\\/]/).pop() ?? file);
  const [first] = names;
  if (!first) return "Configuration class should be marked with proxyBeanMethods = false";

  const more = names.length > 1 ? ` (and ${names.length - 1} more: ${names.slice(1).join(", ")})` : "";
  return `Configuration class ${first} should be marked with proxyBeanMethods = false${more}`;
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  config: "CONFIG_ERROR",
  validation: "VALIDATION_ERROR",
  task: "TASK_ERROR",
  usage: "USAGE_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  details?: string[];
  hint?: string;
  next?: string;
  cause?: unknown;
  exitCode?: number;
};

export class UserFacingError extends BuildWardenError {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly details: string[];
  readonly hint?: string;
  readonly next?: string;
  readonly exitCode: number;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.details = input.details ?? [];
    this.hint = input.hint;
    this.next = input.next;
    this.exitCode = input.exitCode ?? 1;
  }
}
