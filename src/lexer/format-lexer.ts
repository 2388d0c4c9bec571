/**
 * Format Lexer
 *
 * Tokenizes the contents of a format string literal. Only `%d`, `%i`, `%f`
 * and `%s` (with optional sign, width and precision) are specifiers; every
 * other character, escape sequence or `%` directive is normal text.
 */

import { span } from "../utils/span";
import { isDigit } from "./chars";
import { Cursor } from "./cursor";
import { type FormatToken, FormatTokenKind, PrimitiveType } from "./tokens";

const SPECIFIER_TYPES: ReadonlyMap<string, PrimitiveType> = new Map([
  ["d", PrimitiveType.Integer],
  ["i", PrimitiveType.Integer],
  ["f", PrimitiveType.Float],
  ["s", PrimitiveType.String],
]);

export class FormatLexer extends Cursor {
  /**
   * Lex the window `[start, end)` of `source`: the inside of a format string.
   */
  constructor(source: string, start: number, end: number) {
    super(source, start, end);
  }

  /**
   * Get the next token, or null at the end of the format string.
   */
  next(): FormatToken | null {
    this.beginToken();

    if (this.isAtEnd()) {
      return null;
    }

    if (this.peek() === "%") {
      if (this.peek(1) === "%") {
        this.pos += 2;
        return { kind: FormatTokenKind.Normal, span: this.span() };
      }
      const tok = this.scanSpecifier();
      if (tok !== null) {
        return tok;
      }
    }

    // An escape pair never starts a specifier, so `\%d` stays text
    if (this.peek() === "\\" && this.pos + 1 < this.end) {
      this.pos += 2;
      return { kind: FormatTokenKind.Normal, span: this.span() };
    }

    this.advance();
    return { kind: FormatTokenKind.Normal, span: this.span() };
  }

  /**
   * Match `%([+-]?(digits(.digits*)?|.digits))?[difs]`. The cursor only moves
   * on a match.
   */
  private scanSpecifier(): FormatToken | null {
    const start = this.pos;
    this.pos += 1;

    this.scanOptions();
    const optionsEnd = this.pos;

    const type = SPECIFIER_TYPES.get(this.peek());
    if (type === undefined) {
      this.pos = start;
      return null;
    }
    this.advance();

    return {
      kind: FormatTokenKind.Specifier,
      span: this.span(),
      specifier: { options: span(start + 1, optionsEnd), type },
    };
  }

  /**
   * A sign only counts when a width or precision follows it.
   */
  private scanOptions(): void {
    const sign = this.peek() === "+" || this.peek() === "-" ? 1 : 0;
    const next = this.peek(sign);
    if (!isDigit(next) && !(next === "." && isDigit(this.peek(sign + 1)))) {
      return;
    }
    this.pos += sign;

    if (isDigit(this.peek())) {
      while (isDigit(this.peek())) this.advance();
      if (this.peek() === ".") {
        this.advance();
        while (isDigit(this.peek())) this.advance();
      }
    } else if (this.peek() === "." && isDigit(this.peek(1))) {
      this.advance();
      while (isDigit(this.peek())) this.advance();
    }
  }
}

/**
 * Tokenize a whole string as format-string contents (convenience function
 * for testing)
 */
export function tokenizeFormat(content: string): FormatToken[] {
  const lexer = new FormatLexer(content, 0, content.length);
  const tokens: FormatToken[] = [];
  for (let tok = lexer.next(); tok !== null; tok = lexer.next()) {
    tokens.push(tok);
  }
  return tokens;
}
