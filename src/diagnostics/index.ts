/**
 * Diagnostics Module
 *
 * The error taxonomy and its structured, span-based diagnostic records.
 */

export type {
  FormatError,
  FormatErrorKind,
  MissingFunctionArgsError,
  NonliteralFormatError,
  SpecifierCastMismatchError,
  ExcessSpecifiersError,
  ExcessArgsError,
} from "./errors";

export {
  missingFunctionArgs,
  nonliteralFormat,
  specifierCastMismatch,
  excessSpecifiers,
  excessArgs,
  helpExcessArgs,
  helpExcessSpecifiers,
} from "./errors";

export type { Severity, Diagnostic, Label, StructuredData } from "./diagnostic";
export { createDiagnostic, toDiagnostic } from "./diagnostic";

export { ErrorCode } from "./codes";
export type { ErrorCodeType } from "./codes";

export { SourceErrors } from "./source-errors";

export { formatJson, formatPretty, formatSimple, formatSummary } from "./formatter";
