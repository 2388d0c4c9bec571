/**
 * Source Lexer
 *
 * Tokenizes a whole C file just finely enough to find calls of the tracked
 * formatting functions. Comments and string literals are recognized so that
 * a tracked name inside them is never reported; everything else that is not
 * a parenthesis or a tracked name is an `Other` token.
 */

import { isDigit, isIdentifierContinue, isIdentifierStart } from "./chars";
import { Cursor } from "./cursor";
import { type SourceToken, SourceTokenKind, TRACKED_FUNCTIONS } from "./tokens";

export class SourceLexer extends Cursor {
  constructor(source: string) {
    super(source);
  }

  /**
   * Get the next token, or null at end of input. Whitespace is skipped.
   */
  next(): SourceToken | null {
    this.skipWhitespace();
    this.beginToken();

    if (this.isAtEnd()) {
      return null;
    }

    return { kind: this.scanToken(), span: this.span() };
  }

  /**
   * Look at the next token without consuming it.
   */
  peekToken(): SourceToken | null {
    const pos = this.pos;
    const tokenStart = this.tokenStart;
    const tok = this.next();
    this.pos = pos;
    this.tokenStart = tokenStart;
    return tok;
  }

  private scanToken(): SourceTokenKind {
    const char = this.peek();

    if (char === "/" && this.peek(1) === "/") {
      this.scanLineComment();
      return SourceTokenKind.Comment;
    }

    if (char === "/" && this.peek(1) === "*" && this.scanBlockComment()) {
      return SourceTokenKind.Comment;
    }

    if (this.scanStringRun() !== null) {
      return SourceTokenKind.String;
    }

    if (this.scanCharLiteral()) {
      return SourceTokenKind.Other;
    }

    if (char === "(") {
      this.advance();
      return SourceTokenKind.LParen;
    }

    if (char === ")") {
      this.advance();
      return SourceTokenKind.RParen;
    }

    if (isIdentifierStart(char)) {
      return this.scanIdentifier();
    }

    // Numbers are kept whole so a suffix is never read as an identifier
    if (isDigit(char)) {
      while (
        !this.isAtEnd() &&
        (isIdentifierContinue(this.peek()) || this.peek() === ".")
      ) {
        this.advance();
      }
      return SourceTokenKind.Other;
    }

    this.advance();
    return SourceTokenKind.Other;
  }

  private scanIdentifier(): SourceTokenKind {
    const start = this.pos;

    while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
      this.advance();
    }

    const name = this.text.slice(start, this.pos);
    return TRACKED_FUNCTIONS.get(name) ?? SourceTokenKind.Other;
  }
}

/**
 * Tokenize a whole source string (convenience function for testing)
 */
export function tokenizeSource(content: string): SourceToken[] {
  const lexer = new SourceLexer(content);
  const tokens: SourceToken[] = [];
  for (let tok = lexer.next(); tok !== null; tok = lexer.next()) {
    tokens.push(tok);
  }
  return tokens;
}
