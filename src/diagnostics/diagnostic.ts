/**
 * Diagnostic types for structured analyzer output
 *
 * A `Diagnostic` is the presentation-ready form of a `FormatError`: a code,
 * a message, labelled source spans and remediation help.
 */

import type { Span } from "../utils/span";
import { specifierLetter } from "../lexer/tokens";
import { ErrorCode, type ErrorCodeType } from "./codes";
import {
  type FormatError,
  type FormatErrorKind,
  helpExcessArgs,
  helpExcessSpecifiers,
} from "./errors";

/** Every defect the analyzer finds is an error */
export type Severity = "error";

export interface Label {
  span: Span;
  message: string;
}

export interface StructuredData {
  kind: FormatErrorKind;
  expected?: string | undefined;
  actual?: string | undefined;
  count?: number | undefined;
}

export interface Diagnostic {
  severity: Severity;
  code: ErrorCodeType;
  message: string;
  /** Source locations, primary label first */
  labels: Label[];
  help?: string | undefined;
  structured: StructuredData;
}

export function createDiagnostic(
  code: ErrorCodeType,
  message: string,
  labels: Label[],
  structured: StructuredData,
  help?: string
): Diagnostic {
  return {
    severity: "error",
    code,
    message,
    labels,
    help,
    structured,
  };
}

/**
 * Convert an error to its diagnostic.
 */
export function toDiagnostic(error: FormatError): Diagnostic {
  switch (error.kind) {
    case "MissingFunctionArgs":
      return createDiagnostic(
        ErrorCode.MissingFunctionArgs,
        "Missing function arguments.",
        [{ span: error.span, message: "not enough arguments in function call" }],
        { kind: error.kind },
        "Supply enough arguments for the function call."
      );

    case "NonliteralFormat":
      return createDiagnostic(
        ErrorCode.NonliteralFormat,
        "Format string isn't a string literal, " +
          "this is potentially an overflow vulnerability!",
        [{ span: error.span, message: "not a string literal" }],
        {
          kind: error.kind,
          expected: "string literal",
          actual: error.found ?? "expression",
        },
        error.help
      );

    case "SpecifierCastMismatch": {
      const expected = error.specifierType;
      const actual = error.castType;
      return createDiagnostic(
        ErrorCode.SpecifierCastMismatch,
        "Incorrect specifier for type casted argument.",
        [
          {
            span: error.specifierSpan,
            message: `format string expects \`${expected}\` value`,
          },
          { span: error.castSpan, message: `argument is casted as \`${actual}\`` },
        ],
        { kind: error.kind, expected, actual },
        `Change the specifier to \`%${specifierLetter(actual)}\`, ` +
          `or change the cast to \`(${expected})\`.`
      );
    }

    case "ExcessSpecifiers": {
      const count = error.additionalSpecifiers;
      return createDiagnostic(
        ErrorCode.ExcessSpecifiers,
        "Excess specifiers, this will read arbitrary data off the stack!",
        [
          { span: error.formatSpan, message: `${count} too many specifiers` },
          { span: error.argsSpan, message: "not enough arguments" },
        ],
        { kind: error.kind, count },
        helpExcessSpecifiers(count)
      );
    }

    case "ExcessArgs": {
      const count = error.additionalArgs;
      return createDiagnostic(
        ErrorCode.ExcessArgs,
        "Excess arguments.",
        [
          { span: error.formatSpan, message: "not enough specifiers" },
          { span: error.argsSpan, message: `${count} too many arguments` },
        ],
        { kind: error.kind, count },
        helpExcessArgs(count)
      );
    }
  }
}
