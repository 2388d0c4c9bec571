/**
 * Source location tracking utilities
 *
 * Every location the analyzer produces is a `Span` of offsets into the one
 * source string under analysis. Offsets are resolved to line/column
 * positions only when a diagnostic is reported.
 */

/** Half-open range `[start, end)` of string offsets into the source text */
export interface Span {
  start: number;
  end: number;
}

export interface Position {
  /** 1-indexed line number */
  line: number;
  /** 1-indexed column number */
  column: number;
  /** 0-indexed offset */
  offset: number;
}

export interface SourceSpan {
  file: string;
  start: Position;
  end: Position;
}

export function span(start: number, end: number): Span {
  return { start, end };
}

export function emptySpan(at: number): Span {
  return { start: at, end: at };
}

/**
 * Extend `acc` to the end of `next`, or start a new span at `next`.
 */
export function unionSpan(acc: Span | null, next: Span): Span {
  if (acc === null) {
    return next;
  }
  return { start: acc.start, end: next.end };
}

export function sliceSpan(text: string, s: Span): string {
  return text.slice(s.start, s.end);
}

export function position(line: number, column: number, offset: number): Position {
  return { line, column, offset };
}

export function sourceSpan(file: string, start: Position, end: Position): SourceSpan {
  return { file, start, end };
}

export function formatPosition(pos: Position): string {
  return `${pos.line}:${pos.column}`;
}

export function formatSpan(s: SourceSpan): string {
  return `${s.file}:${formatPosition(s.start)}`;
}
