/**
 * Source file handling utilities
 */

import { readFile } from "fs/promises";
import { type Position, type SourceSpan, type Span, position, sourceSpan } from "./span";

export class SourceFile {
  readonly name: string;
  readonly content: string;
  private lineStarts: number[];

  constructor(name: string, content: string) {
    this.name = name;
    this.content = content;
    this.lineStarts = this.computeLineStarts();
  }

  private computeLineStarts(): number[] {
    const starts = [0];
    for (let i = 0; i < this.content.length; i++) {
      if (this.content[i] === "\n") {
        starts.push(i + 1);
      }
    }
    return starts;
  }

  positionAt(offset: number): Position {
    if (offset < 0) offset = 0;
    if (offset > this.content.length) offset = this.content.length;

    // Binary search for the line
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    const line = low + 1;
    const column = offset - this.lineStarts[low] + 1;
    return position(line, column, offset);
  }

  resolve(s: Span): SourceSpan {
    return sourceSpan(this.name, this.positionAt(s.start), this.positionAt(s.end));
  }

  getLine(lineNumber: number): string {
    if (lineNumber < 1 || lineNumber > this.lineStarts.length) {
      return "";
    }
    const start = this.lineStarts[lineNumber - 1];
    const end =
      lineNumber < this.lineStarts.length
        ? this.lineStarts[lineNumber] - 1
        : this.content.length;
    return this.content.slice(start, end).replace(/\r$/, "");
  }
}

export async function readSourceFile(path: string): Promise<SourceFile> {
  const content = await readFile(path, "utf8");
  return new SourceFile(path, content);
}
