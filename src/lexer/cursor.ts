/**
 * Character cursor shared by the lexer tiers
 *
 * A cursor walks a window `[start, end)` of a source string. Tokens are
 * reported with absolute offsets into the whole string, so spans from any
 * tier can be compared and sliced against the original source.
 */

import { type Span, span } from "../utils/span";
import {
  SIMPLE_ESCAPES,
  isHexDigit,
  isOctalDigit,
  isWhitespace,
} from "./chars";

export abstract class Cursor {
  protected readonly text: string;
  protected readonly end: number;
  protected pos: number;
  protected tokenStart: number;

  constructor(text: string, start: number = 0, end: number = text.length) {
    this.text = text;
    this.end = end;
    this.pos = start;
    this.tokenStart = start;
  }

  /**
   * The full text this cursor reads from
   */
  get source(): string {
    return this.text;
  }

  /**
   * Offset of the next unread character
   */
  get offset(): number {
    return this.pos;
  }

  /**
   * Span of the most recently produced token
   */
  span(): Span {
    return span(this.tokenStart, this.pos);
  }

  /**
   * Move the cursor to `offset`; the next token starts there.
   */
  seek(offset: number): void {
    this.pos = Math.min(offset, this.end);
    this.tokenStart = this.pos;
  }

  // ===== Character Navigation =====

  protected isAtEnd(): boolean {
    return this.pos >= this.end;
  }

  protected peek(ahead: number = 0): string {
    const at = this.pos + ahead;
    if (at >= this.end) return "\0";
    return this.text[at];
  }

  protected advance(): string {
    if (this.isAtEnd()) return "\0";
    return this.text[this.pos++];
  }

  protected startsWith(literal: string): boolean {
    return (
      this.pos + literal.length <= this.end &&
      this.text.startsWith(literal, this.pos)
    );
  }

  protected beginToken(): void {
    this.tokenStart = this.pos;
  }

  // ===== Shared C Rules =====

  protected skipWhitespace(): void {
    while (!this.isAtEnd() && isWhitespace(this.peek())) {
      this.advance();
    }
  }

  protected scanLineComment(): void {
    while (!this.isAtEnd() && this.peek() !== "\n" && this.peek() !== "\r") {
      this.advance();
    }
  }

  /**
   * Consume a block comment starting at `/*`. An unterminated comment is not
   * a match: the cursor does not move and false is returned.
   */
  protected scanBlockComment(): boolean {
    const close = this.text.indexOf("*/", this.pos + 2);
    if (close < 0 || close + 2 > this.end) {
      return false;
    }
    this.pos = close + 2;
    return true;
  }

  /**
   * Length of a string prefix (`u8`, `u`, `U`, `L`) directly followed by a
   * double quote, 0 for a bare quote, or -1 when no string starts here.
   */
  protected stringPrefixLength(): number {
    if (this.peek() === '"') return 0;
    if (this.peek() === "u" && this.peek(1) === "8" && this.peek(2) === '"') return 2;
    if ("uUL".includes(this.peek()) && this.peek(1) === '"') return 1;
    return -1;
  }

  /**
   * Consume one or more adjacent string literals separated by whitespace,
   * e.g. `"Hello, " L"world"`.
   *
   * Returns the content span, from after the first opening quote to before
   * the last closing quote, or null (cursor unmoved) if no complete literal
   * starts here.
   */
  protected scanStringRun(): Span | null {
    const start = this.pos;
    let contentStart = -1;
    let lastClose = -1;

    for (;;) {
      const literalStart = this.pos;
      const prefix = this.stringPrefixLength();
      if (prefix < 0) {
        break;
      }
      this.pos += prefix;
      const quote = this.pos;
      if (!this.scanQuoted('"')) {
        this.pos = literalStart;
        break;
      }
      if (contentStart < 0) {
        contentStart = quote + 1;
      }
      lastClose = this.pos;
      this.skipWhitespace();
    }

    if (lastClose < 0) {
      this.pos = start;
      return null;
    }

    this.pos = lastClose;
    return span(contentStart, lastClose - 1);
  }

  /**
   * Consume a character literal such as `'a'`, `L'\n'`. Cursor unmoved and
   * false returned when none starts here.
   */
  protected scanCharLiteral(): boolean {
    const start = this.pos;
    if ("uUL".includes(this.peek()) && this.peek(1) === "'") {
      this.advance();
    }
    if (this.peek() !== "'" || !this.scanQuoted("'")) {
      this.pos = start;
      return false;
    }
    return true;
  }

  /**
   * Consume a quoted run starting at `quote`. Fails on a raw line break, on
   * end of input and on an invalid escape sequence.
   */
  private scanQuoted(quote: string): boolean {
    this.advance();

    while (!this.isAtEnd()) {
      const char = this.peek();
      if (char === quote) {
        this.advance();
        return true;
      }
      if (char === "\n") {
        return false;
      }
      if (char === "\\") {
        if (!this.scanEscapeSequence()) {
          return false;
        }
      } else {
        this.advance();
      }
    }

    return false;
  }

  private scanEscapeSequence(): boolean {
    const next = this.peek(1);

    if (SIMPLE_ESCAPES.has(next)) {
      this.pos += 2;
      return true;
    }

    if (isOctalDigit(next)) {
      this.pos += 1;
      while (isOctalDigit(this.peek())) this.advance();
      return true;
    }

    if ((next === "x" || next === "u") && isHexDigit(this.peek(2))) {
      this.pos += 2;
      while (isHexDigit(this.peek())) this.advance();
      return true;
    }

    // Line continuation
    if (next === "\n") {
      this.pos += 2;
      return true;
    }
    if (next === "\r" && this.peek(2) === "\n") {
      this.pos += 3;
      return true;
    }

    return false;
  }
}
