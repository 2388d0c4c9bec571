/**
 * Code Generator Module
 *
 * Renders a validated IR back to C source.
 */

export { SourceView, type SiteRenderer, type SpanText } from "./render";
export { optimizeSite } from "./optimize";
export { typecastSite } from "./typecast";
