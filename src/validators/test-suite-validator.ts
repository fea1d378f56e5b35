import path from "node:path";

import {
  AmbiguousTestSuiteError,
  IncompleteTestSuiteError,
  MissingTestSuiteError,
} from "../core/errors.js";
import { uniqSorted } from "../core/utils.js";

import { escapeRegExp, filterByFileName, listSourceFiles, readSourceFile } from "./lib/source-scan.js";
import type { ReportSink, ValidatorInput, ValidatorSummary } from "./lib/types.js";

// =============================================================================
// TYPES
// =============================================================================

export type TestSuiteValidatorArgs = ValidatorInput & {
  /** Test source root, relative to the project root. */
  testSourcesDir: string;
  report?: ReportSink;
};

export type TestSourceInventory = {
  suites: string[];
  testClasses: string[];
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const VALIDATOR_NAME = "validate-test-suites";

const COMPILED_UNIT_SUFFIX = ".class";

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * A project with more than one test class needs exactly one `*TestsSuite`
 * file, and that file must mention `<TestClass>.class` for every test class.
 */
export function validateTestSuites(args: TestSuiteValidatorArgs): ValidatorSummary {
  const report = args.report ?? ((line: string) => console.log(line));
  const testRoot = path.join(args.project.rootDir, args.testSourcesDir);
  const { suites, testClasses } = inventoryTestSources(testRoot, args.sourceExtension);
  const project = args.project.displayName;

  if (testClasses.length > 1 && suites.length === 0) {
    throw new MissingTestSuiteError(project, testClasses.length);
  }

  if (suites.length > 1) {
    throw new AmbiguousTestSuiteError(project, suites);
  }

  const [suiteFile] = suites;
  if (suiteFile) {
    const suite = readSourceFile(suiteFile);
    const missing = findMissingReferences(suite.text, testClasses, args.sourceExtension);

    if (missing.length > 0) {
      report(`${path.basename(suiteFile)} of ${project} does not include:`);
      report(missing.join(", "));
      throw new IncompleteTestSuiteError(project, suiteFile, missing);
    }
  }

  return { test_classes: testClasses.length, suites: suites.length };
}

export function inventoryTestSources(testRoot: string, extension: string): TestSourceInventory {
  const files = listSourceFiles(testRoot, { extension });
  const ext = escapeRegExp(extension);

  const suites = filterByFileName(files, new RegExp(`^.*TestsSuite\\.${ext}$`));
  const excluded = new Set(filterByFileName(files, new RegExp(`(Base|Abstract).+Tests\\.${ext}$`)));
  const testClasses = filterByFileName(files, new RegExp(`^.*Tests\\.${ext}$`)).filter(
    (file) => !excluded.has(file),
  );

  return { suites, testClasses };
}

/** Sorted, de-duplicated `<Name>.class` references absent from the suite text. */
export function findMissingReferences(
  suiteText: string,
  testClasses: string[],
  extension: string,
): string[] {
  const missing = testClasses
    .map((file) => compiledUnitName(file, extension))
    .filter((reference) => !suiteText.includes(reference));

  return uniqSorted(missing);
}

export function compiledUnitName(file: string, extension: string): string {
  return `${path.basename(file, `.${extension}`)}${COMPILED_UNIT_SUFFIX}`;
}
