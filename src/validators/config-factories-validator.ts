import fs from "node:fs";
import path from "node:path";

import { MissingRegisteredClassError, type MissingRegisteredClass } from "../core/errors.js";

import { readRegistrationEntries, registeredClasses } from "./lib/registration-file.js";
import type { ValidatorInput, ValidatorSummary } from "./lib/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type ConfigFactoriesValidatorArgs = ValidatorInput & {
  /** Main source root, relative to the project root. */
  mainSourcesDir: string;
  /** Registration file, relative to the project root. */
  registrationFile: string;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const VALIDATOR_NAME = "verify-config-factories";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Every class listed under the bootstrap or auto-configuration key of the
 * project's registration file must exist as a source file. A project without
 * a registration file passes.
 */
export function verifyConfigFactories(args: ConfigFactoriesValidatorArgs): ValidatorSummary {
  const registrationPath = path.join(args.project.rootDir, args.registrationFile);
  const entries = readRegistrationEntries(registrationPath);
  if (!entries) {
    return { registered_classes: 0 };
  }

  const classes = registeredClasses(entries);
  const missing = new Map<string, MissingRegisteredClass>();

  for (const className of classes) {
    const expectedPath = expectedSourcePath(args, className);
    if (!fs.existsSync(expectedPath)) {
      missing.set(className, { className, expectedPath });
    }
  }

  if (missing.size > 0) {
    const sorted = [...missing.values()].sort((a, b) => a.className.localeCompare(b.className));
    throw new MissingRegisteredClassError(args.project.displayName, sorted);
  }

  return { registered_classes: new Set(classes).size };
}

export function expectedSourcePath(
  args: Pick<ConfigFactoriesValidatorArgs, "project" | "mainSourcesDir" | "sourceExtension">,
  className: string,
): string {
  const relative = `${className.split(".").join(path.sep)}.${args.sourceExtension}`;
  return path.join(args.project.rootDir, args.mainSourcesDir, relative);
}
