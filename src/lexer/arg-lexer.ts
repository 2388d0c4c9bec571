/**
 * Argument Lexer
 *
 * Tokenizes the text of a call's argument list. It knows C literals,
 * punctuators and the three recognized casts, but not expression structure:
 * splitting into arguments is the job of `Args`.
 */

import {
  isBinaryDigit,
  isDigit,
  isHexDigit,
  isIdentifierContinue,
  isIdentifierStart,
  isOctalDigit,
} from "./chars";
import { Cursor } from "./cursor";
import {
  type ArgToken,
  ArgTokenKind,
  type PlainArgTokenKind,
  PrimitiveType,
} from "./tokens";

/**
 * Multi-character punctuators, longest first
 */
const PUNCTUATORS: readonly string[] = [
  "...",
  ">>=",
  "<<=",
  "+=",
  "-=",
  "*=",
  "/=",
  "%=",
  "&=",
  "^=",
  "|=",
  ">>",
  "<<",
  "++",
  "--",
  "->",
  "&&",
  "||",
  "<=",
  ">=",
  "==",
  "!=",
  "<%",
  "%>",
  "<:",
  ":>",
];

const SINGLE_PUNCTUATORS = new Set(";{}:=[].&!~-+*/%<>^|?\\#");

const CAST_TYPES: ReadonlyArray<readonly [readonly string[], PrimitiveType]> = [
  [["int"], PrimitiveType.Integer],
  [["float"], PrimitiveType.Float],
  [["char", "*"], PrimitiveType.String],
];

export class ArgLexer extends Cursor {
  /**
   * Lex `source` from `start`, typically just after a call's opening paren.
   */
  constructor(source: string, start: number = 0) {
    super(source, start);
  }

  /**
   * Get the next token, or null at end of input. Whitespace is skipped.
   */
  next(): ArgToken | null {
    this.skipWhitespace();
    this.beginToken();

    if (this.isAtEnd()) {
      return null;
    }

    const char = this.peek();

    if (char === "/" && this.peek(1) === "/") {
      this.scanLineComment();
      return this.plain(ArgTokenKind.Comment);
    }

    if (char === "/" && this.peek(1) === "*" && this.scanBlockComment()) {
      return this.plain(ArgTokenKind.Comment);
    }

    if (char === "(") {
      const type = this.scanTypeCast();
      if (type !== null) {
        return { kind: ArgTokenKind.TypeCast, span: this.span(), type };
      }
      this.advance();
      return this.plain(ArgTokenKind.LParen);
    }

    if (char === ")") {
      this.advance();
      return this.plain(ArgTokenKind.RParen);
    }

    if (char === ",") {
      this.advance();
      return this.plain(ArgTokenKind.Comma);
    }

    const content = this.scanStringRun();
    if (content !== null) {
      return { kind: ArgTokenKind.String, span: this.span(), content };
    }

    if (this.scanCharLiteral()) {
      return this.plain(ArgTokenKind.Char);
    }

    if (isDigit(char) || (char === "." && isDigit(this.peek(1)))) {
      return this.plain(this.scanNumber());
    }

    if (isIdentifierStart(char)) {
      while (!this.isAtEnd() && isIdentifierContinue(this.peek())) {
        this.advance();
      }
      const name = this.text.slice(this.tokenStart, this.pos);
      return { kind: ArgTokenKind.Identifier, span: this.span(), name };
    }

    for (const punctuator of PUNCTUATORS) {
      if (this.startsWith(punctuator)) {
        this.pos += punctuator.length;
        return this.plain(ArgTokenKind.Symbol);
      }
    }

    this.advance();
    return this.plain(
      SINGLE_PUNCTUATORS.has(char) ? ArgTokenKind.Symbol : ArgTokenKind.Unknown
    );
  }

  private plain(kind: PlainArgTokenKind): ArgToken {
    return { kind, span: this.span() };
  }

  // ===== Casts =====

  /**
   * Match `(int)`, `(float)` or `(char*)`, allowing whitespace between the
   * words. The cursor only moves on a match.
   */
  private scanTypeCast(): PrimitiveType | null {
    const start = this.pos;

    for (const [words, type] of CAST_TYPES) {
      this.pos = start + 1;
      if (this.matchWords(words) && this.peek() === ")") {
        this.advance();
        return type;
      }
    }

    this.pos = start;
    return null;
  }

  private matchWords(words: readonly string[]): boolean {
    for (const word of words) {
      this.skipWhitespace();
      if (!this.startsWith(word)) {
        return false;
      }
      this.pos += word.length;
      if (isIdentifierStart(word[0]) && isIdentifierContinue(this.peek())) {
        return false;
      }
    }
    this.skipWhitespace();
    return true;
  }

  // ===== Numbers =====

  private scanNumber(): ArgTokenKind.Int | ArgTokenKind.Float {
    if (this.peek() === "0" && (this.peek(1) === "x" || this.peek(1) === "X")) {
      return this.scanHexNumber();
    }

    const binary = this.peek(1) === "b" || this.peek(1) === "B";
    if (this.peek() === "0" && binary && isBinaryDigit(this.peek(2))) {
      this.pos += 2;
      while (isBinaryDigit(this.peek())) this.advance();
      this.scanIntSuffix();
      return ArgTokenKind.Int;
    }

    const start = this.pos;
    this.scanDigits();
    let isFloat = false;

    if (this.peek() === ".") {
      this.advance();
      this.scanDigits();
      isFloat = true;
    }

    if (this.scanExponent("e")) {
      isFloat = true;
    }

    if (isFloat) {
      this.scanFloatSuffix();
      return ArgTokenKind.Float;
    }

    // A leading zero makes an octal literal; stop at the first non-octal digit
    if (this.text[start] === "0") {
      this.pos = start + 1;
      while (isOctalDigit(this.peek())) this.advance();
    }

    this.scanIntSuffix();
    return ArgTokenKind.Int;
  }

  private scanHexNumber(): ArgTokenKind.Int | ArgTokenKind.Float {
    const start = this.pos;
    this.pos += 2;

    let digits = 0;
    while (isHexDigit(this.peek())) {
      this.advance();
      digits++;
    }

    let fraction = false;
    if (this.peek() === ".") {
      this.advance();
      fraction = true;
      while (isHexDigit(this.peek())) {
        this.advance();
        digits++;
      }
    }

    if (digits === 0) {
      // Bare `0x`: just the zero is a literal
      this.pos = start + 1;
      return ArgTokenKind.Int;
    }

    if (this.scanExponent("p")) {
      this.scanFloatSuffix();
      return ArgTokenKind.Float;
    }

    if (fraction) {
      // Hex floats need a binary exponent; give back the dot
      this.pos = this.text.lastIndexOf(".", this.pos);
    }

    this.scanIntSuffix();
    return ArgTokenKind.Int;
  }

  private scanDigits(): void {
    while (isDigit(this.peek())) this.advance();
  }

  /**
   * Consume `e[+-]digits` (or `p...`), only if digits follow.
   */
  private scanExponent(marker: "e" | "p"): boolean {
    if (this.peek().toLowerCase() !== marker) {
      return false;
    }
    const sign = this.peek(1) === "+" || this.peek(1) === "-" ? 1 : 0;
    if (!isDigit(this.peek(1 + sign))) {
      return false;
    }
    this.pos += 1 + sign;
    this.scanDigits();
    return true;
  }

  private scanFloatSuffix(): void {
    if ("fFlL".includes(this.peek())) {
      this.advance();
    }
  }

  /**
   * Integer suffixes: `u`, `l`, `ll` in either order and either case
   */
  private scanIntSuffix(): void {
    const unsigned = (): boolean => {
      if (this.peek() === "u" || this.peek() === "U") {
        this.advance();
        return true;
      }
      return false;
    };
    const long = (): boolean => {
      if (this.startsWith("ll") || this.startsWith("LL")) {
        this.pos += 2;
        return true;
      }
      if (this.peek() === "l" || this.peek() === "L") {
        this.advance();
        return true;
      }
      return false;
    };

    if (unsigned()) {
      long();
    } else if (long()) {
      unsigned();
    }
  }
}

/**
 * Tokenize an argument list (convenience function for testing)
 */
export function tokenizeArgs(content: string): ArgToken[] {
  const lexer = new ArgLexer(content);
  const tokens: ArgToken[] = [];
  for (let tok = lexer.next(); tok !== null; tok = lexer.next()) {
    tokens.push(tok);
  }
  return tokens;
}

