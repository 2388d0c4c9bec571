#!/usr/bin/env node
/**
 * fmtcheck CLI
 *
 * Command-line interface for the format-string checker.
 */

import { parseArgs } from "util";
import { writeFile } from "fs/promises";
import { parse } from "./parser";
import type { IntermediateRepresentation } from "./ir";
import type { SourceView } from "./codegen";
import { SourceErrors, formatJson, formatPretty, formatSimple } from "./diagnostics";
import { readSourceFile, type SourceFile } from "./utils/source";

// =============================================================================
// Version
// =============================================================================

const VERSION = "0.1.0";

// =============================================================================
// CLI Types
// =============================================================================

type Command = "check" | "help" | "version";
type EmitFormat = "pretty" | "json" | "simple";

const EMIT_FORMATS: readonly EmitFormat[] = ["pretty", "json", "simple"];

interface CliArgs {
  command: Command;
  file: string | null;
  optimize: string | null;
  typecast: string | null;
  emit: EmitFormat;
  quiet: boolean;
}

// =============================================================================
// Argument Parsing
// =============================================================================

function parseCliArgs(argv: string[]): CliArgs | { error: string } {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      optimize: { type: "string" },
      typecast: { type: "string" },
      emit: { type: "string", default: "pretty" },
      quiet: { type: "boolean", short: "q", default: false },
      help: { type: "boolean", short: "h", default: false },
      version: { type: "boolean", short: "v", default: false },
    },
    allowPositionals: true,
  });

  const emit = EMIT_FORMATS.find((format) => format === values.emit);
  if (emit === undefined) {
    return { error: `unknown --emit format '${values.emit ?? ""}'` };
  }

  const base: CliArgs = {
    command: "check",
    file: positionals[0] ?? null,
    optimize: values.optimize ?? null,
    typecast: values.typecast ?? null,
    emit,
    quiet: values.quiet ?? false,
  };

  if (values.help) {
    return { ...base, command: "help" };
  }
  if (values.version) {
    return { ...base, command: "version" };
  }
  if (base.file === null) {
    return { ...base, command: "help" };
  }

  return base;
}

// =============================================================================
// Checking
// =============================================================================

function printErrors(errors: SourceErrors, emit: EmitFormat): void {
  switch (emit) {
    case "pretty":
      console.error(formatPretty(errors));
      break;
    case "json":
      console.log(formatJson(errors));
      break;
    case "simple":
      console.error(formatSimple(errors));
      break;
  }
}

/**
 * Write a rendering to a file that must not exist yet.
 */
async function writeOutput(
  flag: string,
  path: string,
  view: SourceView,
  quiet: boolean
): Promise<boolean> {
  try {
    await writeFile(path, view.toString() + "\n", { flag: "wx" });
  } catch {
    console.error(`error: Failed creating output for --${flag}: ${path}`);
    return false;
  }

  if (!quiet) {
    console.log(`Wrote ${path}`);
  }
  return true;
}

async function writeOutputs(
  ir: IntermediateRepresentation,
  args: CliArgs
): Promise<boolean> {
  let ok = true;

  if (args.optimize !== null) {
    const view = ir.displayOptimize();
    ok = (await writeOutput("optimize", args.optimize, view, args.quiet)) && ok;
  }
  if (args.typecast !== null) {
    const view = ir.displayTypecast();
    ok = (await writeOutput("typecast", args.typecast, view, args.quiet)) && ok;
  }

  return ok;
}

async function runCheck(file: string, args: CliArgs): Promise<number> {
  let source: SourceFile;
  try {
    source = await readSourceFile(file);
  } catch {
    console.error(`error: failed reading input at ${file}`);
    return 1;
  }

  const result = parse(source.content);

  if (!result.ok) {
    printErrors(new SourceErrors(source.name, source.content, result.errors), args.emit);
    return 1;
  }

  return (await writeOutputs(result.ir, args)) ? 0 : 1;
}

function printHelp(): void {
  console.log(`
fmtcheck - Format-string checker for C printf-family calls

USAGE:
  fmtcheck <file> [options]

OPTIONS:
  --optimize <path>     Write the file with calls replaced by safe_* variants
  --typecast <path>     Write the file with an explicit cast on every argument
  --emit <format>       Diagnostic format: pretty, json, simple (default: pretty)
  -q, --quiet           Suppress non-error output
  -h, --help            Print help
  -v, --version         Print version

Output files are never overwritten; writing fails if the path exists.

EXAMPLES:
  fmtcheck main.c
  fmtcheck main.c --optimize main.safe.c
  fmtcheck main.c --typecast main.cast.c --emit=json
`);
}

function printVersion(): void {
  console.log(`fmtcheck ${VERSION}`);
}

// =============================================================================
// Main
// =============================================================================

async function main(): Promise<void> {
  const args = parseCliArgs(process.argv.slice(2));

  if ("error" in args) {
    console.error(`error: ${args.error}`);
    process.exit(1);
  }

  let exitCode = 0;

  switch (args.command) {
    case "help":
      printHelp();
      break;

    case "version":
      printVersion();
      break;

    case "check":
      exitCode = args.file === null ? 1 : await runCheck(args.file, args);
      break;
  }

  if (exitCode !== 0) {
    process.exit(exitCode);
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
