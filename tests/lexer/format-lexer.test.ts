/**
 * Format Lexer Tests
 */

import { describe, test, expect } from "vitest";
import {
  FormatLexer,
  FormatTokenKind,
  PrimitiveType,
  tokenizeFormat,
  type Specifier,
} from "../../src/lexer";

function specifiers(content: string): Specifier[] {
  const result: Specifier[] = [];
  for (const tok of tokenizeFormat(content)) {
    if (tok.kind === FormatTokenKind.Specifier) {
      result.push(tok.specifier);
    }
  }
  return result;
}

describe("FormatLexer", () => {
  describe("Specifiers", () => {
    test("a bare specifier", () => {
      expect(tokenizeFormat("%d")).toEqual([
        {
          kind: FormatTokenKind.Specifier,
          span: { start: 0, end: 2 },
          specifier: { options: { start: 1, end: 1 }, type: PrimitiveType.Integer },
        },
      ]);
    });

    test("sign, width and precision are options", () => {
      expect(specifiers("%-2.3f")).toEqual([
        { options: { start: 1, end: 5 }, type: PrimitiveType.Float },
      ]);
      expect(specifiers("%+5d")).toEqual([
        { options: { start: 1, end: 3 }, type: PrimitiveType.Integer },
      ]);
      expect(specifiers("%-.3s")).toEqual([
        { options: { start: 1, end: 4 }, type: PrimitiveType.String },
      ]);
      expect(specifiers("%.2s")).toEqual([
        { options: { start: 1, end: 3 }, type: PrimitiveType.String },
      ]);
      expect(specifiers("%5.f")).toEqual([
        { options: { start: 1, end: 3 }, type: PrimitiveType.Float },
      ]);
    });

    test("%i is an integer specifier", () => {
      expect(specifiers("%i")).toEqual([
        { options: { start: 1, end: 1 }, type: PrimitiveType.Integer },
      ]);
    });
  });

  describe("Normal Text", () => {
    test("%% is literal text", () => {
      expect(tokenizeFormat("%%d")).toEqual([
        { kind: FormatTokenKind.Normal, span: { start: 0, end: 2 } },
        { kind: FormatTokenKind.Normal, span: { start: 2, end: 3 } },
      ]);
    });

    test("unsupported directives are literal text", () => {
      expect(specifiers("%x %c %.f %u")).toEqual([]);
    });

    test("a sign without width or precision is literal text", () => {
      expect(specifiers("%+d %-s")).toEqual([]);
      expect(tokenizeFormat("%-s").map((t) => t.kind)).toEqual([
        FormatTokenKind.Normal,
        FormatTokenKind.Normal,
        FormatTokenKind.Normal,
      ]);
    });

    test("an escaped percent does not start a specifier", () => {
      expect(tokenizeFormat("\\%d")).toEqual([
        { kind: FormatTokenKind.Normal, span: { start: 0, end: 2 } },
        { kind: FormatTokenKind.Normal, span: { start: 2, end: 3 } },
      ]);
    });
  });

  test("lexes only its window of the source", () => {
    const source = 'printf("%d", x)';
    const lexer = new FormatLexer(source, 8, 10);
    const tok = lexer.next();
    expect(tok?.span).toEqual({ start: 8, end: 10 });
    expect(lexer.next()).toBeNull();
  });
});
