// Validators shared types.
// Purpose: define the shapes every source-scanning validator takes and returns.
// Assumes validators are synchronous and signal failure by throwing a ValidationError.

import type { Project } from "../../core/projects.js";

// =============================================================================
// TYPES
// =============================================================================

export type SourceFile = {
  path: string;
  text: string;
};

/** Counters describing what a validator looked at; logged with task.pass events. */
export type ValidatorSummary = Record<string, number>;

export type ValidatorInput = {
  project: Project;
  sourceExtension: string;
};

/** Sink for diagnostic lines a validator prints before failing. */
export type ReportSink = (line: string) => void;
