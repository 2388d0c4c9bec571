/**
 * Diagnostic Formatter
 *
 * Formats diagnostics for output as JSON or human-readable text.
 */

import type { SourceFile } from "../utils/source";
import { type SourceSpan, formatPosition, formatSpan } from "../utils/span";
import type { Diagnostic, Label } from "./diagnostic";
import type { SourceErrors } from "./source-errors";

/**
 * Format diagnostics as human-readable text with source snippets.
 */
export function formatPretty(errors: SourceErrors): string {
  const diagnostics = errors.diagnostics();
  const lines: string[] = [];

  for (const diag of diagnostics) {
    lines.push(formatDiagnostic(diag, errors.source));
    lines.push("");
  }

  lines.push(formatSummary(diagnostics));

  return lines.join("\n");
}

/**
 * Format a single diagnostic with source context.
 */
function formatDiagnostic(diag: Diagnostic, source: SourceFile): string {
  const lines: string[] = [];
  const located = diag.labels.map((label) => ({
    label,
    loc: source.resolve(label.span),
  }));

  // Header: severity[code]: message
  lines.push(`${diag.severity}[${diag.code}]: ${diag.message}`);

  const primary = located[0];
  if (primary !== undefined) {
    lines.push(`  --> ${formatSpan(primary.loc)}`);
  }

  const maxLine = Math.max(1, ...located.map(({ loc }) => loc.start.line));
  const lineNumWidth = Math.max(3, String(maxLine).length);
  const gutter = " ".repeat(lineNumWidth);

  lines.push(`${gutter} |`);

  // Labels grouped by the line they start on, in order of first appearance
  const byLine = new Map<number, { label: Label; loc: SourceSpan }[]>();
  for (const entry of located) {
    const group = byLine.get(entry.loc.start.line);
    if (group) {
      group.push(entry);
    } else {
      byLine.set(entry.loc.start.line, [entry]);
    }
  }

  for (const [lineNum, group] of byLine) {
    const sourceLine = source.getLine(lineNum);
    lines.push(`${String(lineNum).padStart(lineNumWidth)} | ${sourceLine}`);

    for (const { label, loc } of group) {
      lines.push(`${gutter} | ${underline(loc, sourceLine)} ${label.message}`);
    }
  }

  if (diag.help !== undefined) {
    lines.push(`${gutter} = help: ${diag.help}`);
  }

  return lines.join("\n");
}

/**
 * Carets under a span; a span running past its first line is underlined to
 * the end of that line.
 */
function underline(loc: SourceSpan, sourceLine: string): string {
  const startCol = loc.start.column;
  const endCol = loc.start.line === loc.end.line ? loc.end.column : sourceLine.length + 1;
  const length = Math.max(1, endCol - startCol);
  return " ".repeat(startCol - 1) + "^".repeat(length);
}

/**
 * Format diagnostics as JSON, with spans resolved to line/column positions.
 */
export function formatJson(errors: SourceErrors): string {
  const diagnostics = errors.diagnostics().map((diag) => ({
    ...diag,
    labels: diag.labels.map((label) => ({
      ...label,
      location: errors.source.resolve(label.span),
    })),
  }));

  return JSON.stringify({ file: errors.filename, diagnostics }, null, 2);
}

/**
 * Format diagnostics as a simple list (no source context).
 */
export function formatSimple(errors: SourceErrors): string {
  return errors
    .diagnostics()
    .map((d) => {
      const first = d.labels[0];
      const offset = first === undefined ? 0 : first.span.start;
      const loc = formatPosition(errors.source.positionAt(offset));
      return `${errors.filename}:${loc}: ${d.severity}[${d.code}]: ${d.message}`;
    })
    .join("\n");
}

/**
 * Create a summary line for a set of diagnostics.
 */
export function formatSummary(diagnostics: Diagnostic[]): string {
  const count = diagnostics.length;
  if (count === 0) {
    return "No errors";
  }
  return `${count} error${count === 1 ? "" : "s"}`;
}
