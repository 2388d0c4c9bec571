/**
 * Optimize renderer
 *
 * Replaces each call with its fixed-arity safe variant. The format string is
 * flattened into `chunk, value, formatter` triples after an argument count,
 * `3 * values + 1`, which the runtime uses to know how many to read:
 *
 * ```c
 * printf("Hi %s, you are %d", name, age);
 * safe_printf(7, "Hi ", (void*) (name), fmt_string,
 *             ", you are ", (void*) &(age), fmt_int, "")
 * ```
 */

import { PrimitiveType, formatterName } from "../lexer/tokens";
import type { Site } from "../ir/ir";
import type { SpanText } from "./render";

function header(site: Site, text: SpanText): string {
  switch (site.kind) {
    case "printf":
      return "safe_printf(";
    case "sprintf":
      return `safe_sprintf((char* restrict) (${text(site.buffer)}), `;
    case "snprintf":
      return (
        `safe_snprintf((char* restrict) (${text(site.buffer)}), ` +
        `(size_t) (${text(site.bufsz)}), `
      );
  }
}

export function optimizeSite(site: Site, text: SpanText): string {
  const { pairs, last } = site.format;
  let out = header(site, text) + String(pairs.length * 3 + 1);

  for (const { chunk, value } of pairs) {
    const type = value.specifier.type;
    // Strings are already pointers
    const addressOf = type === PrimitiveType.String ? "" : "&";
    const pointer = `(void*) ${addressOf}(${text(value.arg)})`;
    out += `, "${text(chunk)}", ${pointer}, ${formatterName(type)}`;
  }

  return out + `, "${text(last)}")`;
}
