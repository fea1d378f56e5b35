import path from "node:path";

import { MissingProxyDeclarationError } from "../core/errors.js";

import { escapeRegExp, filterByFileName, listSourceFiles, readSourceFile } from "./lib/source-scan.js";
import type { ValidatorInput, ValidatorSummary } from "./lib/types.js";
import {
  RegexSelfInvocationDetector,
  type SelfInvocationDetector,
} from "./self-invocation-detector.js";

// =============================================================================
// TYPES
// =============================================================================

export type BeanProxyValidatorArgs = ValidatorInput & {
  /** Directory scanned recursively, relative to the project root. */
  scanRoot: string;
  /** File-name suffix (before the extension) of configuration classes. */
  classSuffix: string;
  ignoreDirs?: string[];
  /** Roots of other projects nested in this one; their files belong to them. */
  nestedProjectDirs?: string[];
  detector?: SelfInvocationDetector;
};

export type ConfigurationClassVerdict = {
  file: string;
  selfInvoked: string[];
  hasProxyDeclaration: boolean;
  compliant: boolean;
};

// =============================================================================
// CONSTANTS
// =============================================================================

export const VALIDATOR_NAME = "verify-bean-proxying";

export const CONFIGURATION_MARKER = "@Configuration";

const PROXY_DECLARATION_PATTERN =
  /@Configuration\(value\s*=\s*"(\w+)",\s*proxyBeanMethods\s*=\s*(false|true)\)/;

// =============================================================================
// PUBLIC API
// =============================================================================

/**
 * Configuration classes that never call their own public methods must spell
 * out `@Configuration(value = "...", proxyBeanMethods = ...)`. Classes with
 * self-invocation are left alone.
 */
export function verifyBeanProxyDeclarations(args: BeanProxyValidatorArgs): ValidatorSummary {
  const detector = args.detector ?? new RegexSelfInvocationDetector();
  const scanRoot = path.resolve(args.project.rootDir, args.scanRoot);
  const namePattern = new RegExp(
    `${escapeRegExp(args.classSuffix)}\\.${escapeRegExp(args.sourceExtension)}$`,
  );

  const candidates = filterByFileName(
    listSourceFiles(scanRoot, {
      extension: args.sourceExtension,
      ignoreDirs: args.ignoreDirs,
      excludeDirs: args.nestedProjectDirs,
    }),
    namePattern,
  );

  const offenders: string[] = [];
  let configurationClasses = 0;
  let selfInvoking = 0;

  for (const file of candidates) {
    const verdict = inspectConfigurationClass(file, detector);
    if (!verdict) continue;

    configurationClasses++;
    if (verdict.selfInvoked.length > 0) selfInvoking++;
    if (!verdict.compliant) offenders.push(verdict.file);
  }

  if (offenders.length > 0) {
    throw new MissingProxyDeclarationError(args.project.displayName, offenders);
  }

  return { configuration_classes: configurationClasses, self_invoking: selfInvoking };
}

/** Returns null when the file does not carry the configuration marker. */
export function inspectConfigurationClass(
  filePath: string,
  detector: SelfInvocationDetector,
): ConfigurationClassVerdict | null {
  const source = readSourceFile(filePath);
  if (!source.text.includes(CONFIGURATION_MARKER)) {
    return null;
  }

  const { selfInvoked } = detector.detect(source.text);
  const hasProxyDeclaration = PROXY_DECLARATION_PATTERN.test(source.text);

  // Only classes without self-invocation are required to declare proxying.
  // TODO: confirm with the Spring platform owners whether this condition should be inverted.
  const compliant = selfInvoked.length > 0 || hasProxyDeclaration;

  return { file: source.path, selfInvoked, hasProxyDeclaration, compliant };
}
