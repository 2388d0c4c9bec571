/**
 * Argument Splitter
 *
 * Splits a call's argument list into top-level arguments. Commas nested in
 * parentheses do not split, and the `)` that closes the call ends the list.
 */

import { ArgLexer } from "../lexer/arg-lexer";
import type { SourceLexer } from "../lexer/source-lexer";
import { ArgTokenKind, type ArgToken, type PrimitiveType } from "../lexer/tokens";
import { type Span, emptySpan, span, unionSpan } from "../utils/span";
import {
  type FormatError,
  missingFunctionArgs,
  nonliteralFormat,
} from "../diagnostics/errors";

export interface Cast {
  type: PrimitiveType;
  span: Span;
}

/**
 * An argument in a function call, e.g. `input` in `printf("%s", input)`.
 */
export interface Arg {
  /** The token, if there's exactly one (skipping comments and parentheses) */
  singleToken: ArgToken | null;
  span: Span;
  /** Leading cast of the argument, if present */
  cast: Cast | null;
}

export interface FormatString {
  /** The whole literal, quotes included */
  span: Span;
  /** Text between the quotes */
  content: Span;
}

export type FormatStringResult =
  | { ok: true; format: FormatString }
  | { ok: false; error: FormatError };

export class Args {
  /** Held so it can be moved past the call's `)` once the list ends */
  private readonly sourceLexer: SourceLexer;
  private readonly lexer: ArgLexer;
  private finished = false;
  /** Offset just after the call's `(` */
  readonly start: number;
  /** End of the last token read that belongs to an argument */
  private end: number;

  /**
   * Start splitting at the source lexer's position, which must be just past
   * the call's opening paren.
   */
  constructor(sourceLexer: SourceLexer) {
    this.sourceLexer = sourceLexer;
    this.start = sourceLexer.offset;
    this.end = this.start;
    this.lexer = new ArgLexer(sourceLexer.source, this.start);
  }

  /**
   * Span of the whole argument list read so far.
   */
  get span(): Span {
    return span(this.start, this.end);
  }

  /**
   * Get the next argument, or null when the list has ended.
   */
  next(): Arg | null {
    if (this.finished) {
      return null;
    }

    let cast: Cast | null = null;
    let argSpan: Span | null = null;
    let depth = 0;
    let first: ArgToken | null = null;
    let count = 0;

    for (;;) {
      const tok = this.lexer.next();

      if (tok === null) {
        // No closing paren: the call swallows the rest of the file
        this.finish(this.lexer.offset);
        return null;
      }

      switch (tok.kind) {
        case ArgTokenKind.Comma:
          if (depth === 0) {
            return {
              singleToken: count === 1 ? first : null,
              span: argSpan ?? emptySpan(tok.span.start),
              cast,
            };
          }
          if (count === 0) first = tok;
          count++;
          break;

        case ArgTokenKind.LParen:
          depth++;
          break;

        case ArgTokenKind.RParen:
          if (depth === 0) {
            this.finish(tok.span.end);
            if (argSpan === null) {
              return null;
            }
            return { singleToken: count === 1 ? first : null, span: argSpan, cast };
          }
          depth--;
          break;

        case ArgTokenKind.Comment:
          break;

        case ArgTokenKind.TypeCast:
          if (cast === null && count === 0) {
            cast = { type: tok.type, span: tok.span };
            break;
          }
          if (count === 0) first = tok;
          count++;
          break;

        default:
          if (count === 0) first = tok;
          count++;
          break;
      }

      argSpan = unionSpan(argSpan, tok.span);
      this.end = tok.span.end;
    }
  }

  /**
   * Drain the remaining arguments, returning how many there were and the
   * span of the whole argument list.
   */
  shortCircuit(): { count: number; span: Span } {
    let count = 0;
    while (this.next() !== null) {
      count++;
    }
    return { count, span: this.span };
  }

  /**
   * Read the next argument as a format string literal.
   */
  nextFormatString(): FormatStringResult {
    const arg = this.next();

    if (arg === null) {
      return { ok: false, error: missingFunctionArgs(this.span) };
    }

    const tok = arg.singleToken;
    if (tok?.kind === ArgTokenKind.String) {
      return { ok: true, format: { span: arg.span, content: tok.content } };
    }

    return { ok: false, error: nonliteralFormat(arg.span, tok) };
  }

  /**
   * Resume source-level scanning just past the end of the argument list.
   */
  private finish(resumeAt: number): void {
    this.finished = true;
    this.sourceLexer.seek(resumeAt);
  }
}
