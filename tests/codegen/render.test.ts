/**
 * Renderer Tests
 */

import { describe, test, expect } from "vitest";
import { parse } from "../../src/parser";
import type { IntermediateRepresentation } from "../../src/ir";

function ir(source: string): IntermediateRepresentation {
  const result = parse(source);
  if (!result.ok) {
    throw new Error(`parse failed: ${result.errors.map((e) => e.kind).join(", ")}`);
  }
  return result.ir;
}

function optimize(source: string): string {
  return ir(source).displayOptimize().toString();
}

function typecast(source: string): string {
  return ir(source).displayTypecast().toString();
}

describe("optimize", () => {
  test("printf", () => {
    expect(optimize('printf("Hi %s, you are %d", name, age);')).toBe(
      'safe_printf(7, "Hi ", (void*) (name), fmt_string, ' +
        '", you are ", (void*) &(age), fmt_int, "");'
    );
  });

  test("sprintf", () => {
    expect(optimize('sprintf(out, "%d", n);')).toBe(
      'safe_sprintf((char* restrict) (out), 4, "", (void*) &(n), fmt_int, "");'
    );
  });

  test("snprintf", () => {
    expect(optimize('snprintf(buf, n, "%s", str)')).toBe(
      'safe_snprintf((char* restrict) (buf), (size_t) (n), 4, "", (void*) (str), fmt_string, "")'
    );
  });

  test("floats are passed by address", () => {
    expect(optimize('printf("%.2f\\n", (float) total)')).toBe(
      'safe_printf(4, "", (void*) &((float) total), fmt_float, "\\n")'
    );
  });

  test("a call without values", () => {
    expect(optimize('printf("done\\n");')).toBe('safe_printf(1, "done\\n");');
  });

  test("adjacent literals stay inside one pair of quotes", () => {
    expect(optimize('printf("a" "%d", n)')).toBe(
      'safe_printf(4, "a" "", (void*) &(n), fmt_int, "")'
    );
  });
});

describe("typecast", () => {
  test("adds casts to uncast arguments", () => {
    expect(typecast('printf("Hi %s, you are %d", name, age);')).toBe(
      'printf("Hi %s, you are %d", (char*) (name), (int) (age));'
    );
  });

  test("keeps arguments whose cast already matches", () => {
    expect(typecast('printf("%5.2f\\n", (float) x);')).toBe('printf("%5.2f\\n", (float) x);');
  });

  test("re-emits %i as %d", () => {
    expect(typecast('printf("%i", n)')).toBe('printf("%d", (int) (n))');
  });

  test("sprintf and snprintf", () => {
    expect(typecast('sprintf(out, "%d", n)')).toBe(
      'sprintf((char* restrict) (out), "%d", (int) (n))'
    );
    expect(typecast('snprintf(buf, 8, "%-3s|", s)')).toBe(
      'snprintf((char* restrict) (buf), (size_t) (8), "%-3s|", (char*) (s))'
    );
  });
});

describe("SourceView", () => {
  test("a file without calls renders unchanged", () => {
    const source = "#include <stdio.h>\n\nint main(void) {\n\treturn 0; /* printf( */\n}\n";
    expect(optimize(source)).toBe(source);
    expect(typecast(source)).toBe(source);
  });

  test("layout around calls is preserved", () => {
    const source = 'int main() {\n  printf("x");\n}\n';
    expect(optimize(source)).toBe('int main() {\n  safe_printf(1, "x");\n}\n');
  });

  test("rendering is repeatable", () => {
    const view = ir('printf("%d", n);').displayTypecast();
    expect(view.toString()).toBe(view.toString());
  });
});
