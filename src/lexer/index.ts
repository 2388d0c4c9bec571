/**
 * Lexer Module
 *
 * Exports the three lexer tiers and their token types.
 */

export { SourceLexer, tokenizeSource } from "./source-lexer";
export { ArgLexer, tokenizeArgs } from "./arg-lexer";
export { FormatLexer, tokenizeFormat } from "./format-lexer";
export { Cursor } from "./cursor";
export {
  type SourceToken,
  type ArgToken,
  type PlainArgTokenKind,
  type FormatToken,
  type Specifier,
  SourceTokenKind,
  ArgTokenKind,
  FormatTokenKind,
  PrimitiveType,
  TRACKED_FUNCTIONS,
  specifierLetter,
  formatterName,
  describeArgToken,
} from "./tokens";
export {
  isDigit,
  isOctalDigit,
  isHexDigit,
  isBinaryDigit,
  isIdentifierStart,
  isIdentifierContinue,
  isWhitespace,
} from "./chars";
