/**
 * Error Code Registry
 *
 * Error codes follow the pattern:
 * - E01xx: Call shape errors (arguments missing, format not a literal)
 * - E02xx: Type errors between specifiers and casts
 * - E03xx: Count errors between specifiers and arguments
 */

import type { FormatErrorKind } from "./errors";

export const ErrorCode = {
  MissingFunctionArgs: "E0101",
  NonliteralFormat: "E0102",
  SpecifierCastMismatch: "E0201",
  ExcessSpecifiers: "E0301",
  ExcessArgs: "E0302",
} as const satisfies Record<FormatErrorKind, string>;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];
