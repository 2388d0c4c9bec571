/**
 * Token type definitions for the three lexer tiers
 *
 * The source tier finds call sites, the argument tier splits a call's
 * argument list, and the format tier finds specifiers inside a format
 * string. The tiers are lexically incompatible (`%` is an operator in an
 * argument and a specifier in a format string), so each has its own kinds.
 */

import type { Span } from "../utils/span";

// =============================================================================
// Primitive Types
// =============================================================================

/**
 * C types that can be formatted. The value is the C spelling of the type.
 */
export enum PrimitiveType {
  Integer = "int",
  Float = "float",
  String = "char*",
}

const SPECIFIER_LETTERS: Record<PrimitiveType, string> = {
  [PrimitiveType.Integer]: "d",
  [PrimitiveType.Float]: "f",
  [PrimitiveType.String]: "s",
};

const FORMATTER_NAMES: Record<PrimitiveType, string> = {
  [PrimitiveType.Integer]: "fmt_int",
  [PrimitiveType.Float]: "fmt_float",
  [PrimitiveType.String]: "fmt_string",
};

/**
 * Letter that tells C how to format a value in a format string.
 */
export function specifierLetter(type: PrimitiveType): string {
  return SPECIFIER_LETTERS[type];
}

/**
 * Name of the runtime function that formats a value of this type.
 */
export function formatterName(type: PrimitiveType): string {
  return FORMATTER_NAMES[type];
}

// =============================================================================
// Source Tokens
// =============================================================================

export enum SourceTokenKind {
  Comment = "Comment",
  String = "String",
  LParen = "LParen",
  RParen = "RParen",
  Printf = "Printf",
  Sprintf = "Sprintf",
  Snprintf = "Snprintf",
  Other = "Other",
}

export interface SourceToken {
  kind: SourceTokenKind;
  span: Span;
}

/**
 * Identifiers that the source lexer reports as their own token kinds
 */
export const TRACKED_FUNCTIONS: Map<string, SourceTokenKind> = new Map([
  ["printf", SourceTokenKind.Printf],
  ["sprintf", SourceTokenKind.Sprintf],
  ["snprintf", SourceTokenKind.Snprintf],
]);

// =============================================================================
// Argument Tokens
// =============================================================================

export enum ArgTokenKind {
  Comment = "Comment",
  Symbol = "Symbol",
  LParen = "LParen",
  RParen = "RParen",
  Comma = "Comma",
  Char = "Char",
  String = "String",
  Int = "Int",
  Float = "Float",
  TypeCast = "TypeCast",
  Identifier = "Identifier",
  Unknown = "Unknown",
}

export type PlainArgTokenKind = Exclude<
  ArgTokenKind,
  ArgTokenKind.String | ArgTokenKind.TypeCast | ArgTokenKind.Identifier
>;

export type ArgToken =
  | { kind: PlainArgTokenKind; span: Span }
  /** `content` excludes the outermost quotes and any prefix */
  | { kind: ArgTokenKind.String; span: Span; content: Span }
  | { kind: ArgTokenKind.TypeCast; span: Span; type: PrimitiveType }
  | { kind: ArgTokenKind.Identifier; span: Span; name: string };

// =============================================================================
// Format Tokens
// =============================================================================

/**
 * One format directive, e.g. `%-2.3f`.
 */
export interface Specifier {
  /** The `-2.3` part of `%-2.3f` */
  options: Span;
  type: PrimitiveType;
}

export enum FormatTokenKind {
  Specifier = "Specifier",
  Normal = "Normal",
}

export type FormatToken =
  | { kind: FormatTokenKind.Specifier; span: Span; specifier: Specifier }
  | { kind: FormatTokenKind.Normal; span: Span };

/**
 * Get a human-readable description of an argument token for error messages
 */
export function describeArgToken(tok: ArgToken): string {
  switch (tok.kind) {
    case ArgTokenKind.Identifier:
      return `identifier '${tok.name}'`;
    case ArgTokenKind.String:
      return "string literal";
    case ArgTokenKind.TypeCast:
      return `cast to '${tok.type}'`;
    case ArgTokenKind.Int:
      return "integer literal";
    case ArgTokenKind.Float:
      return "float literal";
    case ArgTokenKind.Char:
      return "character literal";
    default:
      return `'${tok.kind}'`;
  }
}
