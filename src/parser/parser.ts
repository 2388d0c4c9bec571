/**
 * Call-Site Scanner
 *
 * Makes the single pass over a C file: finds every call of a tracked
 * formatting function, validates it, and keeps the text between calls
 * verbatim. A bad call does not stop the scan, so one pass reports the
 * defects of every call in the file.
 */

import { SourceLexer } from "../lexer/source-lexer";
import { SourceTokenKind } from "../lexer/tokens";
import { type Span, span } from "../utils/span";
import { type FormatError, missingFunctionArgs } from "../diagnostics/errors";
import {
  IntermediateRepresentation,
  type InterpolationPair,
  type Site,
  interpolation,
} from "../ir/ir";
import { Args } from "./args";
import { matchFormat } from "./matcher";

export type ParseResult =
  | { ok: true; ir: IntermediateRepresentation }
  | { ok: false; errors: FormatError[] };

/**
 * Parse C source code into an `IntermediateRepresentation`, or return every
 * error found.
 */
export function parse(source: string): ParseResult {
  const lexer = new SourceLexer(source);
  const errors: FormatError[] = [];
  let pairs: InterpolationPair<Site>[] | null = [];
  let chunkStart = 0;

  for (let tok = lexer.next(); tok !== null; tok = lexer.next()) {
    if (!isTrackedCall(tok.kind)) {
      continue;
    }

    // `void* p = printf;` is not a call; the name stays in the chunk
    if (lexer.peekToken()?.kind !== SourceTokenKind.LParen) {
      continue;
    }

    const chunk = span(chunkStart, tok.span.start);
    lexer.next();

    const site = parseSite(tok.kind, source, new Args(lexer), errors);
    chunkStart = lexer.offset;

    if (site === null) {
      pairs = null;
    } else if (pairs !== null) {
      pairs.push({ chunk, value: site });
    }
  }

  if (pairs === null) {
    return { ok: false, errors };
  }

  const body = interpolation(pairs, span(chunkStart, source.length));
  return { ok: true, ir: new IntermediateRepresentation(source, body) };
}

type TrackedKind =
  | SourceTokenKind.Printf
  | SourceTokenKind.Sprintf
  | SourceTokenKind.Snprintf;

function isTrackedCall(kind: SourceTokenKind): kind is TrackedKind {
  return (
    kind === SourceTokenKind.Printf ||
    kind === SourceTokenKind.Sprintf ||
    kind === SourceTokenKind.Snprintf
  );
}

/**
 * Parse the arguments of one call. `sprintf` takes a buffer and `snprintf`
 * a buffer and its size before the format string.
 *
 * ```c
 * snprintf(buffer, bufsz, "Total: $%d", (cost + fee) * tax);
 * //      ^                                               ^
 * //      args start here                   lexer ends up here
 * ```
 */
function parseSite(
  kind: TrackedKind,
  source: string,
  args: Args,
  errors: FormatError[]
): Site | null {
  switch (kind) {
    case SourceTokenKind.Printf: {
      const format = matchFormat(source, args, errors);
      return format === null ? null : { kind: "printf", format };
    }

    case SourceTokenKind.Sprintf: {
      const buffer = takeLeadingArg(args, errors);
      if (buffer === null) return null;
      const format = matchFormat(source, args, errors);
      return format === null ? null : { kind: "sprintf", buffer, format };
    }

    case SourceTokenKind.Snprintf: {
      const buffer = takeLeadingArg(args, errors);
      if (buffer === null) return null;
      const bufsz = takeLeadingArg(args, errors);
      if (bufsz === null) return null;
      const format = matchFormat(source, args, errors);
      return format === null ? null : { kind: "snprintf", buffer, bufsz, format };
    }
  }
}

/**
 * Take one of the arguments that precede the format string.
 */
function takeLeadingArg(args: Args, errors: FormatError[]): Span | null {
  const arg = args.next();
  if (arg === null) {
    errors.push(missingFunctionArgs(args.shortCircuit().span));
    return null;
  }
  return arg.span;
}
