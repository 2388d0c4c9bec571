/**
 * Intermediate representation of a validated C file
 *
 * The IR never copies text. Every fragment is a `Span` into the source string
 * the IR was parsed from, resolved only when a renderer produces output.
 */

import type { Span } from "../utils/span";
import type { Specifier } from "../lexer/tokens";
import { SourceView, optimizeSite, typecastSite } from "../codegen";

/**
 * Literal text separated by meaningful values: `chunk value chunk value ... last`.
 */
export interface Interpolation<T> {
  readonly pairs: ReadonlyArray<InterpolationPair<T>>;
  readonly last: Span;
}

export interface InterpolationPair<T> {
  /** Literal text before `value` */
  readonly chunk: Span;
  readonly value: T;
}

/**
 * Pairing of an argument to be printed with the specifier that says how to
 * print it.
 */
export interface FormatValue {
  /** The argument, e.g. `name` */
  readonly arg: Span;
  /** The argument was cast to the same type the specifier expects */
  readonly typeChecked: boolean;
  readonly specifier: Specifier;
}

/**
 * One validated call of a tracked formatting function. `buffer` and `bufsz`
 * are passed through verbatim.
 */
export type Site =
  | { readonly kind: "printf"; readonly format: Interpolation<FormatValue> }
  | {
      readonly kind: "sprintf";
      readonly buffer: Span;
      readonly format: Interpolation<FormatValue>;
    }
  | {
      readonly kind: "snprintf";
      readonly buffer: Span;
      readonly bufsz: Span;
      readonly format: Interpolation<FormatValue>;
    };

export function interpolation<T>(
  pairs: InterpolationPair<T>[],
  last: Span
): Interpolation<T> {
  return { pairs, last };
}

export class IntermediateRepresentation {
  /** The text every span in `body` points into */
  readonly source: string;
  readonly body: Interpolation<Site>;

  constructor(source: string, body: Interpolation<Site>) {
    this.source = source;
    this.body = body;
  }

  get sites(): Site[] {
    return this.body.pairs.map((pair) => pair.value);
  }

  /**
   * View that replaces `printf` and family with calls to the fixed-arity
   * safe variants.
   */
  displayOptimize(): SourceView {
    return new SourceView(this, optimizeSite);
  }

  /**
   * View that adds an explicit cast to every argument that lacks a matching one.
   */
  displayTypecast(): SourceView {
    return new SourceView(this, typecastSite);
  }
}
