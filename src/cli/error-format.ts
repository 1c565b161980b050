/*
Purpose: render errors for refwatch CLI output, with optional color.
Assumptions: stderr is the default stream; non-TTY output disables color; command stderr appears only in debug mode.
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

type LineStyle = {
  label: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  /** Multi-line values go on their own indented lines below the label. */
  block?: boolean;
};

// =============================================================================
// OUTPUT
// =============================================================================

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });

  const stream = options.stream ?? process.stderr;
  const format = createAnsiFormatter(resolveColorEnabled({ stream, useColor: options.useColor }));

  return lines.map((line) => renderLine(line, format)).join("\n");
}

// =============================================================================
// INTERNALS
// =============================================================================

const LINE_STYLES: Partial<Record<ErrorFormatLineKind, LineStyle>> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  output: { label: "Output:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style) return line.text;

  const label = format(style.label, style.labelStyles);
  if (style.block) {
    return `${label}\n${format(indentMultiline(line.text, 2), style.textStyles)}`;
  }
  return `${label} ${format(line.text, style.textStyles)}`;
}

function indentMultiline(value: string, spaces: number): string {
  const prefix = " ".repeat(Math.max(0, spaces));
  return value
    .split("\n")
    .map((line) => `${prefix}${line}`)
    .join("\n");
}
