/**
 * fmtcheck
 *
 * Main entry point for the printf-family format-string checker.
 */

export * from "./lexer";
export * from "./parser";
export * from "./ir";
export * from "./codegen";
export * from "./diagnostics";
export * from "./utils";
