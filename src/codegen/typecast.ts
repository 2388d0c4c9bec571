/**
 * Typecast renderer
 *
 * Re-emits each call with its original format string and adds an explicit
 * cast of the specifier's type to every argument whose cast did not already
 * match it.
 */

import { specifierLetter } from "../lexer/tokens";
import type { Site } from "../ir/ir";
import type { SpanText } from "./render";

function header(site: Site, text: SpanText): string {
  switch (site.kind) {
    case "printf":
      return 'printf("';
    case "sprintf":
      return `sprintf((char* restrict) (${text(site.buffer)}), "`;
    case "snprintf":
      return (
        `snprintf((char* restrict) (${text(site.buffer)}), ` +
        `(size_t) (${text(site.bufsz)}), "`
      );
  }
}

export function typecastSite(site: Site, text: SpanText): string {
  const { pairs, last } = site.format;
  let out = header(site, text);

  // Reconstruct the format string
  for (const { chunk, value } of pairs) {
    const { options, type } = value.specifier;
    out += `${text(chunk)}%${text(options)}${specifierLetter(type)}`;
  }
  out += `${text(last)}"`;

  for (const { value } of pairs) {
    out += value.typeChecked
      ? `, ${text(value.arg)}`
      : `, (${value.specifier.type}) (${text(value.arg)})`;
  }

  return out + ")";
}
