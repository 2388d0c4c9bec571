/**
 * Format Errors
 *
 * The closed set of defects the analyzer reports. Each error carries the
 * spans that locate it in the original source; the text is produced when an
 * error is turned into a `Diagnostic`.
 */

import type { Span } from "../utils/span";
import {
  ArgTokenKind,
  PrimitiveType,
  describeArgToken,
  type ArgToken,
} from "../lexer/tokens";

export type FormatErrorKind =
  | "MissingFunctionArgs"
  | "NonliteralFormat"
  | "SpecifierCastMismatch"
  | "ExcessSpecifiers"
  | "ExcessArgs";

export type FormatError =
  | MissingFunctionArgsError
  | NonliteralFormatError
  | SpecifierCastMismatchError
  | ExcessSpecifiersError
  | ExcessArgsError;

/** The call has fewer arguments than the function requires */
export interface MissingFunctionArgsError {
  kind: "MissingFunctionArgs";
  /** The argument region of the call */
  span: Span;
}

/** The format-string argument is not a string literal */
export interface NonliteralFormatError {
  kind: "NonliteralFormat";
  span: Span;
  /** Description of the lone token passed instead, if there was exactly one */
  found: string | null;
  help: string;
}

export interface SpecifierCastMismatchError {
  kind: "SpecifierCastMismatch";
  specifierSpan: Span;
  specifierType: PrimitiveType;
  castSpan: Span;
  castType: PrimitiveType;
}

export interface ExcessSpecifiersError {
  kind: "ExcessSpecifiers";
  formatSpan: Span;
  argsSpan: Span;
  additionalSpecifiers: number;
}

export interface ExcessArgsError {
  kind: "ExcessArgs";
  formatSpan: Span;
  argsSpan: Span;
  additionalArgs: number;
}

// =============================================================================
// Constructors
// =============================================================================

export function missingFunctionArgs(span: Span): MissingFunctionArgsError {
  return { kind: "MissingFunctionArgs", span };
}

/**
 * Build the error for a non-literal format argument. When the argument is a
 * bare identifier the help suggests printing it through `%s`.
 */
export function nonliteralFormat(
  span: Span,
  singleToken: ArgToken | null
): NonliteralFormatError {
  const help =
    singleToken?.kind === ArgTokenKind.Identifier
      ? `To safely print a string, use \`printf("%s", ${singleToken.name})\` instead.`
      : 'Use a string literal as the first argument, like `printf("hello")`.';

  return {
    kind: "NonliteralFormat",
    span,
    found: singleToken === null ? null : describeArgToken(singleToken),
    help,
  };
}

export function specifierCastMismatch(
  specifierSpan: Span,
  specifierType: PrimitiveType,
  castSpan: Span,
  castType: PrimitiveType
): SpecifierCastMismatchError {
  return {
    kind: "SpecifierCastMismatch",
    specifierSpan,
    specifierType,
    castSpan,
    castType,
  };
}

export function excessSpecifiers(
  formatSpan: Span,
  argsSpan: Span,
  additionalSpecifiers: number
): ExcessSpecifiersError {
  return { kind: "ExcessSpecifiers", formatSpan, argsSpan, additionalSpecifiers };
}

export function excessArgs(
  formatSpan: Span,
  argsSpan: Span,
  additionalArgs: number
): ExcessArgsError {
  return { kind: "ExcessArgs", formatSpan, argsSpan, additionalArgs };
}

// =============================================================================
// Help Text
// =============================================================================

export function helpExcessArgs(count: number): string {
  if (count === 1) {
    return "Add a specifier or remove an argument.";
  }
  return `Add ${count} specifiers or remove ${count} arguments.`;
}

export function helpExcessSpecifiers(count: number): string {
  if (count === 1) {
    return "Add an argument or remove a specifier.";
  }
  return `Add ${count} arguments or remove ${count} specifiers.`;
}
