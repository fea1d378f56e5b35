/*
Purpose: decide whether a configuration class calls its own public methods.
Assumptions: text heuristics only; identifiers are never resolved, so a method
name that also appears as a call on an unrelated object still counts.
Usage: new RegexSelfInvocationDetector().detect(source).selfInvoked.length > 0
*/

// =============================================================================
// TYPES
// =============================================================================

export type SelfInvocationReport = {
  /** Public method names in declaration order. */
  methods: string[];
  /** Methods whose `<name>(` appears more than once (declaration + a call). */
  selfInvoked: string[];
};

export interface SelfInvocationDetector {
  detect(source: string): SelfInvocationReport;
}

// =============================================================================
// REGEX DETECTOR
// =============================================================================

const METHOD_DECLARATION_PATTERN = String.raw`public\s\w+(<\w+>)*\s(\w+)\(`;

export class RegexSelfInvocationDetector implements SelfInvocationDetector {
  detect(source: string): SelfInvocationReport {
    // Fresh regex per call: a shared /g regex would carry lastIndex across files.
    const declarations = new RegExp(METHOD_DECLARATION_PATTERN, "g");
    const methods = Array.from(source.matchAll(declarations), (match) => match[2]);

    const selfInvoked = methods.filter((name) => countOccurrences(source, `${name}(`) > 1);

    return { methods, selfInvoked };
  }
}

export function countOccurrences(text: string, needle: string): number {
  if (needle.length === 0) return 0;

  let count = 0;
  let from = text.indexOf(needle);
  while (from !== -1) {
    count++;
    from = text.indexOf(needle, from + needle.length);
  }
  return count;
}
