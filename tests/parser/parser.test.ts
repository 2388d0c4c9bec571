/**
 * Call-Site Scanner Tests
 */

import { describe, test, expect } from "vitest";
import { parse, type ParseResult } from "../../src/parser";
import type { FormatError, FormatErrorKind } from "../../src/diagnostics";
import type { IntermediateRepresentation } from "../../src/ir";
import { sliceSpan } from "../../src/utils";

function parseOk(source: string): IntermediateRepresentation {
  const result = parse(source);
  if (!result.ok) {
    const kinds = result.errors.map((e) => e.kind).join(", ");
    throw new Error(`expected ${JSON.stringify(source)} to parse, got ${kinds}`);
  }
  return result.ir;
}

function parseErrors(source: string): FormatError[] {
  const result = parse(source);
  if (result.ok) {
    throw new Error(`expected ${JSON.stringify(source)} to fail`);
  }
  return result.errors;
}

function errorKinds(source: string): FormatErrorKind[] {
  return parseErrors(source).map((e) => e.kind);
}

describe("parse", () => {
  describe("Call Sites", () => {
    test("finds a printf call", () => {
      const source = 'printf("%d", x);';
      const ir = parseOk(source);

      expect(ir.sites.map((s) => s.kind)).toEqual(["printf"]);
      expect(ir.body.pairs[0].chunk).toEqual({ start: 0, end: 0 });
      expect(sliceSpan(source, ir.body.last)).toBe(";");
    });

    test("keeps the text between calls verbatim", () => {
      const source = 'int main() {\n  printf("a");\n  puts("b");\n  printf("c");\n}\n';
      const ir = parseOk(source);

      expect(ir.body.pairs.map((p) => sliceSpan(source, p.chunk))).toEqual([
        "int main() {\n  ",
        ';\n  puts("b");\n  ',
      ]);
      expect(sliceSpan(source, ir.body.last)).toBe(";\n}\n");
    });

    test("reads buffer and size arguments", () => {
      const source = 'sprintf(out, "%d", n); snprintf(buf + 1, sizeof buf, "%s", s);';
      const sites = parseOk(source).sites;

      expect(sites.map((s) => s.kind)).toEqual(["sprintf", "snprintf"]);
      const [first, second] = sites;
      expect(first.kind === "sprintf" && sliceSpan(source, first.buffer)).toBe("out");
      expect(second.kind === "snprintf" && sliceSpan(source, second.buffer)).toBe("buf + 1");
      expect(second.kind === "snprintf" && sliceSpan(source, second.bufsz)).toBe("sizeof buf");
    });

    test("only the leading cast of an argument is checked", () => {
      const source = 'printf("%d", (int)(float) x);';
      const site = parseOk(source).sites[0];
      expect(site.format.pairs.map((p) => p.value.typeChecked)).toEqual([true]);
      expect(sliceSpan(source, site.format.pairs[0].value.arg)).toBe("(int)(float) x");
    });

    test("a nested call is a single argument", () => {
      const source = 'printf("%d", f(a, b));';
      const site = parseOk(source).sites[0];
      expect(site.format.pairs.map((p) => sliceSpan(source, p.value.arg))).toEqual(["f(a, b)"]);
    });
  });

  describe("Ignored Text", () => {
    test("a file without calls is one chunk", () => {
      const source = "int main(void) {\n  return 0;\n}\n";
      const ir = parseOk(source);
      expect(ir.body.pairs).toEqual([]);
      expect(ir.body.last).toEqual({ start: 0, end: source.length });
    });

    test("a tracked name that is not called stays in the chunk", () => {
      const source = "int (*p)(const char*, ...) = printf;";
      expect(parseOk(source).body.last).toEqual({ start: 0, end: source.length });
    });

    test("calls inside strings and comments are ignored", () => {
      const source = 'puts("printf(x)"); // printf(y)\n/* sprintf(z) */';
      expect(parseOk(source).sites).toEqual([]);
    });
  });

  describe("Errors", () => {
    test("nonliteral format", () => {
      expect(errorKinds("printf(msg);")).toEqual(["NonliteralFormat"]);
    });

    test("sprintf without arguments", () => {
      expect(parseErrors("sprintf();")).toEqual([
        { kind: "MissingFunctionArgs", span: { start: 8, end: 8 } },
      ]);
    });

    test("snprintf without a size", () => {
      expect(parseErrors("snprintf(buf);")).toEqual([
        { kind: "MissingFunctionArgs", span: { start: 9, end: 12 } },
      ]);
    });

    test("an unclosed call drops its partial argument", () => {
      expect(parseErrors('printf("hi"')).toEqual([
        { kind: "MissingFunctionArgs", span: { start: 7, end: 11 } },
      ]);
    });

    test("an argument for a bare-sign directive is in excess", () => {
      expect(parseErrors('printf("%-s", x);')).toEqual([
        {
          kind: "ExcessArgs",
          formatSpan: { start: 7, end: 12 },
          argsSpan: { start: 7, end: 15 },
          additionalArgs: 1,
        },
      ]);
    });

    test("errors from every call are collected in order", () => {
      expect(errorKinds('printf(x); printf("ok"); printf("%d"); printf("", 1);')).toEqual([
        "NonliteralFormat",
        "ExcessSpecifiers",
        "ExcessArgs",
      ]);
    });

    test("scanning resumes after a bad call", () => {
      const errors = parseErrors('printf(x, "%d"); printf("%s", (int) y);');
      expect(errors.map((e) => e.kind)).toEqual(["NonliteralFormat", "SpecifierCastMismatch"]);
    });
  });

  test("parsing is deterministic", () => {
    const source = 'printf("%d %s", (int) a, b); sprintf(buf, "%f", c);';
    const first: ParseResult = parse(source);
    const second: ParseResult = parse(source);
    expect(first).toEqual(second);
  });
});
