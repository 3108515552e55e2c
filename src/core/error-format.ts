/*
Purpose: shared error formatting helpers for CLI output and log warnings.
Assumptions: callers decide where lines are written; this module only builds text.
Usage: formatErrorLines(err, { mode: "short" }), formatErrorMessage(err).
*/

import { BridgeError, UserFacingError, userFacingCodeForKind } from "./errors.js";

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

export type AnsiStyle = "red" | "yellow" | "cyan" | "dim" | "bold";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

// =============================================================================
// MESSAGES
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
    lines.push({ kind: "code", text: error.code });
  } else if (error instanceof BridgeError) {
    lines.push({ kind: "title", text: `${error.kind}.` });
    lines.push({ kind: "message", text: error.message });
    lines.push({ kind: "code", text: userFacingCodeForKind(error.kind) });
  } else {
    lines.push({ kind: "title", text: "Command failed." });
    lines.push({ kind: "message", text: formatErrorMessage(error) });
  }

  if (options.mode === "debug") {
    lines.push(...debugLines(error));
  }

  return lines;
}

// =============================================================================
// COLOR
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
  dim: [2, 22],
  bold: [1, 22],
};

export function resolveColorEnabled(options: { stream?: { isTTY?: boolean } }): boolean {
  if (!options.stream?.isTTY) return false;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (text, styles) => {
    if (!enabled || styles.length === 0) return text;
    return styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function debugLines(error: unknown): ErrorFormatLine[] {
  const lines: ErrorFormatLine[] = [];
  if (!(error instanceof Error)) return lines;

  lines.push({ kind: "name", text: error.name });

  const cause = resolveCause(error);
  if (cause !== undefined) {
    lines.push({ kind: "cause", text: formatErrorMessage(cause) });
  }

  if (error.stack) {
    lines.push({ kind: "stack", text: error.stack });
  }

  return lines;
}

function resolveCause(error: Error): unknown {
  if (!("cause" in error)) return undefined;
  const cause: unknown = error.cause;
  return cause === null ? undefined : cause;
}
