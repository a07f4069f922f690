import type { LoxError } from "./diagnostics.js";

export type FormatDiagnosticOptions = {
  contextLines?: number;
  filePath?: string;
};

function computeLineStarts(src: string): number[] {
  const starts = [0];
  for (let i = 0; i < src.length; i++) {
    if (src.charCodeAt(i) === 10 /* \n */) starts.push(i + 1);
  }
  return starts;
}

function getLineText(src: string, lineStarts: number[], line: number): string {
  const idx = Math.max(1, line) - 1;
  const start = lineStarts[idx] ?? 0;
  const end = lineStarts[idx + 1] ?? src.length;
  // drop trailing newline
  const raw = src.slice(start, end);
  return raw.endsWith("\n") ? raw.slice(0, -1) : raw;
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

function caretLine(col: number, lineNoWidth: number): string {
  const safeCol = Math.max(1, col);
  return `${" ".repeat(lineNoWidth)} | ${" ".repeat(safeCol - 1)}^`;
}

function header(error: LoxError, filePath: string | undefined): string {
  const severity = error.kind === "ParseError" ? "parse error" : "runtime error";
  const col = error.column ?? 1;
  const location = filePath
    ? `${filePath}:${error.line}:${col}`
    : `line ${error.line}:${col}`;
  return `${location} ${severity}: ${error.detail}`;
}

/**
 * Formats a diagnostic with a code frame pointing at the offending column.
 * Without `source` only the header line is produced.
 */
export function formatDiagnostic(
  error: LoxError,
  source?: string,
  opts: FormatDiagnosticOptions = {}
): string {
  const h = header(error, opts.filePath);
  if (source === undefined) return h;

  const contextLines = opts.contextLines ?? 0;
  const lineStarts = computeLineStarts(source);
  const lineNo = Math.max(1, error.line);
  const startLine = Math.max(1, lineNo - contextLines);
  const endLine = Math.min(lineStarts.length, lineNo + contextLines);
  const lineNoWidth = String(endLine).length;

  const lines: string[] = [h];
  for (let ln = startLine; ln <= endLine; ln++) {
    const txt = getLineText(source, lineStarts, ln);
    lines.push(`${padLeft(String(ln), lineNoWidth)} | ${txt}`);
    if (ln === lineNo) lines.push(caretLine(error.column ?? 1, lineNoWidth));
  }
  return lines.join("\n");
}
