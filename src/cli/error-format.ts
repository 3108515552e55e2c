/*
Purpose: print bridge failures and switch warnings on the terminal.
Assumptions: color only when the stream is a TTY and NO_COLOR is unset.
Usage: console.error(renderCliError(err, { debug })); console.warn(renderCliWarning(text)).
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

export type CliStream = { isTTY?: boolean };

const LABELS: Partial<Record<ErrorFormatLineKind, [label: string, styles: AnsiStyle[]]>> = {
  hint: ["Hint:", ["yellow"]],
  next: ["Next:", ["cyan"]],
  code: ["Code:", ["dim"]],
  name: ["Name:", ["dim"]],
  cause: ["Cause:", ["dim"]],
};

export function renderCliError(
  error: unknown,
  options: { debug?: boolean; stream?: CliStream } = {},
): string {
  const format = formatterFor(options.stream);
  return formatErrorLines(error, { mode: options.debug ? "debug" : "short" })
    .map((line) => renderLine(line, format))
    .join("\n");
}

export function renderCliWarning(message: string, stream?: CliStream): string {
  return `${formatterFor(stream)("Warning:", ["yellow", "bold"])} ${message}`;
}

function formatterFor(stream: CliStream = process.stderr): AnsiFormatter {
  return createAnsiFormatter(resolveColorEnabled({ stream }));
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "title") {
    return `${format("Error:", ["red", "bold"])} ${format(line.text, ["bold"])}`;
  }
  if (line.kind === "stack") {
    const indented = line.text.replace(/^/gm, "  ");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const label = LABELS[line.kind];
  if (label === undefined) return line.text;
  const [prefix, styles] = label;
  // Labels of low-priority lines are dimmed together with their text.
  const text = styles.includes("dim") ? format(line.text, styles) : line.text;
  return `${format(prefix, styles)} ${text}`;
}
