/*
Purpose: turn arbitrary thrown values into structured lines for CLI and log output.
Assumptions: UserFacingError carries the curated title/hint; everything else is summarized.
Usage: formatErrorLines(err, { mode: "debug" }), formatErrorMessage(err).
*/

import { UserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "detail"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "red" | "yellow" | "cyan" | "bold" | "dim";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// CONSTANTS
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  bold: [1, 22],
  dim: [2, 22],
};

const UNKNOWN_ERROR_TITLE = "Command failed.";

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];

  if (error instanceof UserFacingError) {
    lines.push({ kind: "title", text: error.title });
    lines.push({ kind: "message", text: error.message });
    for (const detail of error.details) {
      lines.push({ kind: "detail", text: detail });
    }
    if (error.hint) lines.push({ kind: "hint", text: error.hint });
    if (error.next) lines.push({ kind: "next", text: error.next });
  } else {
    lines.push({ kind: "title", text: UNKNOWN_ERROR_TITLE });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode !== "debug") {
    return lines;
  }

  if (error instanceof UserFacingError) {
    lines.push({ kind: "code", text: error.code });
  }
  if (error instanceof Error) {
    lines.push({ kind: "name", text: error.name });
  }

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error instanceof Error && error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

export function resolveColorEnabled(opts: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!opts.stream.isTTY) return false;
  if (process.env.NO_COLOR !== undefined) return false;
  return opts.useColor ?? true;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function resolveCause(error: unknown): unknown {
  if (error && typeof error === "object" && "cause" in error) {
    return error.cause;
  }
  return undefined;
}
