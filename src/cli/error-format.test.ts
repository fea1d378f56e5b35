import { describe, expect, it } from "vitest";

import { MissingTestSuiteError, USER_FACING_ERROR_CODES, UserFacingError } from "../core/errors.js";

import { renderCliError } from "./error-format.js";

// =============================================================================
// HELPERS
// =============================================================================

const nonTtyStream = { isTTY: false };

function buildUserFacingError(): UserFacingError {
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: "Config error",
    message: "Missing config value",
    hint: "Run buildwarden init",
    next: "Edit .buildwarden/config.yaml",
  });
}

// =============================================================================
// TESTS
// =============================================================================

describe("renderCliError", () => {
  it("renders user-facing errors in short mode without stack output", () => {
    const error = buildUserFacingError();

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Config error",
        "Missing config value",
        "Hint: Run buildwarden init",
        "Next: Edit .buildwarden/config.yaml",
      ].join("\n"),
    );
  });

  it("lists details between the message and the hint", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Convention check failed.",
      message: "2 of 6 task run(s) failed.",
      details: ["project 'core' validate-test-suites: [MissingTestSuite] no suite"],
      hint: "Add a suite.",
    });

    const output = renderCliError(error, { stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Convention check failed.",
        "2 of 6 task run(s) failed.",
        "  - project 'core' validate-test-suites: [MissingTestSuite] no suite",
        "Hint: Add a suite.",
      ].join("\n"),
    );
  });

  it("includes debug details and stack output when debug is enabled", () => {
    const error = new UserFacingError({
      code: USER_FACING_ERROR_CODES.validation,
      title: "Convention check failed.",
      message: "1 of 1 task run(s) failed.",
      cause: new MissingTestSuiteError("project 'core'", 2),
    });
    error.stack = "UserFacingError: 1 of 1 task run(s) failed.\nat fake:1:1";

    const output = renderCliError(error, { debug: true, stream: nonTtyStream });

    expect(output).toBe(
      [
        "Error: Convention check failed.",
        "1 of 1 task run(s) failed.",
        "Code: VALIDATION_ERROR",
        "Name: UserFacingError",
        "Cause: Project project 'core' is missing a TestsSuite class, while it contains 2 tests",
        "Stack:",
        "  UserFacingError: 1 of 1 task run(s) failed.",
        "  at fake:1:1",
      ].join("\n"),
    );
  });

  it("summarizes unexpected errors", () => {
    const output = renderCliError(new Error("EACCES"), { stream: nonTtyStream });

    expect(output).toBe(["Error: Command failed.", "EACCES"].join("\n"));
  });

  it("disables color for non-TTY output even when useColor is true", () => {
    const error = buildUserFacingError();

    const output = renderCliError(error, { stream: nonTtyStream, useColor: true });

    expect(output).toContain("Error: Config error");
    expect(output).not.toContain("\x1b[");
  });
});
