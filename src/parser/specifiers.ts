/**
 * Specifier Scanner
 *
 * Walks a format string's contents one specifier at a time, keeping track of
 * the literal text around them.
 */

import { FormatLexer } from "../lexer/format-lexer";
import { FormatTokenKind, type Specifier } from "../lexer/tokens";
import { type Span, emptySpan, span } from "../utils/span";

export class Specifiers {
  private readonly lexer: FormatLexer;
  private readonly contentEnd: number;
  private lastEnd: number;
  private lastSpan: Span;
  /**
   * Text between the previous specifier (or the opening quote) and the last
   * one yielded
   */
  before: Span;
  /** Text after the last specifier yielded */
  remainder: Span;

  /**
   * @param content - the inside of the format string literal
   */
  constructor(source: string, content: Span) {
    this.lexer = new FormatLexer(source, content.start, content.end);
    this.contentEnd = content.end;
    this.lastEnd = content.start;
    this.lastSpan = emptySpan(content.start);
    this.before = emptySpan(content.start);
    this.remainder = content;
  }

  /**
   * Get the next specifier, or null when only literal text is left.
   */
  next(): Specifier | null {
    for (let tok = this.lexer.next(); tok !== null; tok = this.lexer.next()) {
      if (tok.kind === FormatTokenKind.Specifier) {
        this.before = span(this.lastEnd, tok.span.start);
        this.remainder = span(tok.span.end, this.contentEnd);
        this.lastEnd = tok.span.end;
        this.lastSpan = tok.span;
        return tok.specifier;
      }
    }
    return null;
  }

  /**
   * Span of the last specifier yielded, `%` and letter included.
   */
  span(): Span {
    return this.lastSpan;
  }

  /**
   * Consume the remaining specifiers and return how many there were.
   */
  drain(): number {
    let count = 0;
    while (this.next() !== null) {
      count++;
    }
    return count;
  }
}
