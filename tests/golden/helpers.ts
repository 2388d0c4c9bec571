/**
 * Golden Test Helpers
 *
 * Utilities for loading and checking golden test fixtures. Each fixture is a
 * directory under `fixtures/` holding `input.c` and, for valid inputs, the
 * expected `optimize.c` and `typecast.c` renderings.
 */

import { readFile } from "fs/promises";
import { join } from "path";
import { parse, type ParseResult } from "../../src/parser";
import { SourceErrors, formatSimple } from "../../src/diagnostics";
import { readSourceFile, type SourceFile } from "../../src/utils/source";

export interface GoldenResult {
  source: SourceFile;
  result: ParseResult;
}

export type Rendering = "optimize" | "typecast";

// =============================================================================
// Fixture Path Helpers
// =============================================================================

export function fixturePath(fixture: string, file: string): string {
  return join(__dirname, "fixtures", fixture, file);
}

// =============================================================================
// Loading
// =============================================================================

export async function loadAndParse(fixture: string): Promise<GoldenResult> {
  const source = await readSourceFile(fixturePath(fixture, "input.c"));
  return { source, result: parse(source.content) };
}

export async function readExpected(fixture: string, rendering: Rendering): Promise<string> {
  return readFile(fixturePath(fixture, `${rendering}.c`), "utf8");
}

export function render(golden: GoldenResult, rendering: Rendering): string {
  if (!golden.result.ok) {
    throw new Error(`${golden.source.name} has errors:\n${summarizeErrors(golden)}`);
  }
  const ir = golden.result.ir;
  const view = rendering === "optimize" ? ir.displayOptimize() : ir.displayTypecast();
  return view.toString();
}

// =============================================================================
// Error Helpers
// =============================================================================

/**
 * `line:column code` for each reported error, in order.
 */
export function errorLocations(golden: GoldenResult): string[] {
  if (golden.result.ok) {
    return [];
  }
  const errors = new SourceErrors(golden.source.name, golden.source.content, golden.result.errors);
  return errors.diagnostics().map((d) => {
    const first = d.labels[0];
    const pos = golden.source.positionAt(first === undefined ? 0 : first.span.start);
    return `${pos.line}:${pos.column} ${d.code}`;
  });
}

export function summarizeErrors(golden: GoldenResult): string {
  if (golden.result.ok) {
    return "No errors";
  }
  const { name, content } = golden.source;
  return formatSimple(new SourceErrors(name, content, golden.result.errors));
}
