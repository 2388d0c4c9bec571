/**
 * Matcher Tests
 *
 * Drives `matchFormat` over the arguments of a single call.
 */

import { describe, test, expect } from "vitest";
import { PrimitiveType, SourceLexer } from "../../src/lexer";
import { Args, matchFormat } from "../../src/parser";
import type { FormatError } from "../../src/diagnostics";
import { sliceSpan } from "../../src/utils";

function match(source: string) {
  const lexer = new SourceLexer(source);
  lexer.next();
  lexer.next();
  const errors: FormatError[] = [];
  const format = matchFormat(source, new Args(lexer), errors);
  return { format, errors, offset: lexer.offset };
}

describe("matchFormat", () => {
  describe("Pairs", () => {
    test("pairs each specifier with an argument", () => {
      const source = 'printf("Hi %s, you are %d", name, age);';
      const { format, errors, offset } = match(source);

      expect(errors).toEqual([]);
      expect(offset).toBe(source.length - 1);
      expect(format?.pairs.map((p) => sliceSpan(source, p.chunk))).toEqual(["Hi ", ", you are "]);
      expect(format?.pairs.map((p) => sliceSpan(source, p.value.arg))).toEqual(["name", "age"]);
      expect(format?.pairs.map((p) => p.value.specifier.type)).toEqual([
        PrimitiveType.String,
        PrimitiveType.Integer,
      ]);
      expect(format?.last).toEqual({ start: 25, end: 25 });
    });

    test("a matching cast marks the value type-checked", () => {
      const { format } = match('printf("%f %d", (float) x, y)');
      expect(format?.pairs.map((p) => p.value.typeChecked)).toEqual([true, false]);
    });

    test("a format without specifiers takes no arguments", () => {
      const source = 'printf("hello\\n")';
      const { format, errors } = match(source);
      expect(errors).toEqual([]);
      expect(format?.pairs).toEqual([]);
      expect(format !== null && sliceSpan(source, format.last)).toBe("hello\\n");
    });
  });

  describe("Count Errors", () => {
    test("too many specifiers", () => {
      const { format, errors, offset } = match('printf("%d %d", 1)');
      expect(format).toBeNull();
      expect(errors).toEqual([
        {
          kind: "ExcessSpecifiers",
          formatSpan: { start: 7, end: 14 },
          argsSpan: { start: 7, end: 17 },
          additionalSpecifiers: 1,
        },
      ]);
      expect(offset).toBe(18);
    });

    test("counts every unmatched specifier", () => {
      const { errors } = match('printf("%d %s %f")');
      expect(errors).toEqual([
        {
          kind: "ExcessSpecifiers",
          formatSpan: { start: 7, end: 17 },
          argsSpan: { start: 7, end: 17 },
          additionalSpecifiers: 3,
        },
      ]);
    });

    test("too many arguments", () => {
      const { format, errors, offset } = match('printf("%d", 1, 2)');
      expect(format).toBeNull();
      expect(errors).toEqual([
        {
          kind: "ExcessArgs",
          formatSpan: { start: 7, end: 11 },
          argsSpan: { start: 7, end: 17 },
          additionalArgs: 1,
        },
      ]);
      expect(offset).toBe(18);
    });

    test("counts every extra argument", () => {
      const { errors } = match('printf("x", a, b, c)');
      expect(errors).toEqual([
        {
          kind: "ExcessArgs",
          formatSpan: { start: 7, end: 10 },
          argsSpan: { start: 7, end: 19 },
          additionalArgs: 3,
        },
      ]);
    });

    test("the arguments span runs from the open paren to the last argument", () => {
      const { errors } = match('printf("no specifiers", x);');
      expect(errors).toEqual([
        {
          kind: "ExcessArgs",
          formatSpan: { start: 7, end: 22 },
          argsSpan: { start: 7, end: 25 },
          additionalArgs: 1,
        },
      ]);
    });
  });

  describe("Cast Errors", () => {
    test("a cast that disagrees with its specifier", () => {
      const { format, errors } = match('printf("%d", (float) x)');
      expect(format).toBeNull();
      expect(errors).toEqual([
        {
          kind: "SpecifierCastMismatch",
          specifierSpan: { start: 8, end: 10 },
          specifierType: PrimitiveType.Integer,
          castSpan: { start: 13, end: 20 },
          castType: PrimitiveType.Float,
        },
      ]);
    });

    test("every cast mismatch in a call is reported", () => {
      const { errors } = match('printf("%d %s", (float) x, (int) y)');
      expect(errors.map((e) => e.kind)).toEqual(["SpecifierCastMismatch", "SpecifierCastMismatch"]);
    });

    test("a count error after a cast mismatch is reported too", () => {
      const { errors } = match('printf("%d %d", (float) x)');
      expect(errors.map((e) => e.kind)).toEqual(["SpecifierCastMismatch", "ExcessSpecifiers"]);
    });
  });

  describe("Format Errors", () => {
    test("a nonliteral format consumes the whole call", () => {
      const source = "printf(fmt, a, b) + 1";
      const { format, errors, offset } = match(source);
      expect(format).toBeNull();
      expect(errors.map((e) => e.kind)).toEqual(["NonliteralFormat"]);
      expect(offset).toBe(17);
    });
  });
});
