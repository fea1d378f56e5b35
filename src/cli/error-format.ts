/*
Purpose: print failures from any command as labelled, optionally colored stderr lines.
Assumptions: color is off for pipes and when NO_COLOR is set.
Usage: console.error(renderCliError(err, { debug: isDebugEnabled }));
*/

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

// =============================================================================
// TYPES
// =============================================================================

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineLayout = {
  /** Printed before the text; omitted for plain lines. */
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  /** Text goes on the following lines, indented. */
  block?: boolean;
};

// =============================================================================
// LAYOUT
// =============================================================================

const LINE_LAYOUT: Record<ErrorFormatLineKind, LineLayout> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  detail: { label: "  -", labelStyles: ["dim"], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

const BLOCK_INDENT = "  ";

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const useColor = resolveColorEnabled({
    stream: options.stream ?? process.stderr,
    useColor: options.useColor,
  });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const layout = LINE_LAYOUT[line.kind];
  const text = layout.block ? indentBlock(line.text) : line.text;
  const styled = layout.textStyles.length > 0 ? format(text, layout.textStyles) : text;

  if (!layout.label) return styled;

  const label = format(layout.label, layout.labelStyles);
  return layout.block ? `${label}\n${styled}` : `${label} ${styled}`;
}

function indentBlock(value: string): string {
  return value
    .split("\n")
    .map((line) => `${BLOCK_INDENT}${line}`)
    .join("\n");
}
