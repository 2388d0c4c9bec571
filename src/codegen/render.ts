/**
 * Source reconstruction from the IR
 *
 * A `SourceView` re-emits the file: each verbatim chunk, then the rendering
 * of the call that follows it, and finally the trailing chunk. Views are
 * stateless; rendering never changes the IR.
 */

import type { IntermediateRepresentation, Site } from "../ir/ir";
import { type Span, sliceSpan } from "../utils/span";

/**
 * Renders one call site. `text` resolves a span of the original source.
 */
export type SiteRenderer = (site: Site, text: SpanText) => string;

export type SpanText = (s: Span) => string;

export class SourceView {
  private readonly ir: IntermediateRepresentation;
  private readonly renderSite: SiteRenderer;

  constructor(ir: IntermediateRepresentation, renderSite: SiteRenderer) {
    this.ir = ir;
    this.renderSite = renderSite;
  }

  toString(): string {
    const source = this.ir.source;
    const text: SpanText = (s) => sliceSpan(source, s);
    const output: string[] = [];

    for (const { chunk, value } of this.ir.body.pairs) {
      output.push(text(chunk));
      output.push(this.renderSite(value, text));
    }
    output.push(text(this.ir.body.last));

    return output.join("");
  }
}
