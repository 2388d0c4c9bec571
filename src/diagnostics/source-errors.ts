/**
 * A collection of things that went wrong while validating a file: everything
 * a presentation layer needs to report them.
 */

import { SourceFile } from "../utils/source";
import type { FormatError } from "./errors";
import { type Diagnostic, toDiagnostic } from "./diagnostic";

export class SourceErrors {
  readonly message = "Source code contains errors.";
  readonly source: SourceFile;
  readonly errors: readonly FormatError[];

  constructor(filename: string, source: string, errors: readonly FormatError[]) {
    this.source = new SourceFile(filename, source);
    this.errors = errors;
  }

  get filename(): string {
    return this.source.name;
  }

  diagnostics(): Diagnostic[] {
    return this.errors.map(toDiagnostic);
  }
}
