/**
 * Character classes of the C lexical grammar
 *
 * All checks take a single UTF-16 code unit; the lexers use "\0" as the
 * end-of-input sentinel, which belongs to no class.
 */

function code(char: string): number {
  return char.length === 0 ? -1 : char.charCodeAt(0);
}

/**
 * Check if a character is a decimal digit
 */
export function isDigit(char: string): boolean {
  const c = code(char);
  return c >= 0x30 && c <= 0x39; // 0-9
}

export function isOctalDigit(char: string): boolean {
  const c = code(char);
  return c >= 0x30 && c <= 0x37; // 0-7
}

/**
 * Check if a character is a hex digit
 */
export function isHexDigit(char: string): boolean {
  const c = code(char);
  return (
    (c >= 0x30 && c <= 0x39) || // 0-9
    (c >= 0x41 && c <= 0x46) || // A-F
    (c >= 0x61 && c <= 0x66) // a-f
  );
}

export function isBinaryDigit(char: string): boolean {
  return char === "0" || char === "1";
}

/**
 * Check if a character can start an identifier: `[a-zA-Z_$]`
 */
export function isIdentifierStart(char: string): boolean {
  const c = code(char);
  return (
    (c >= 0x41 && c <= 0x5a) || // A-Z
    (c >= 0x61 && c <= 0x7a) || // a-z
    char === "_" ||
    char === "$"
  );
}

/**
 * Check if a character is valid in an identifier after the first character
 */
export function isIdentifierContinue(char: string): boolean {
  return isIdentifierStart(char) || isDigit(char);
}

/**
 * Whitespace as C defines it: space, tab, vertical tab, CR, LF, form feed
 */
export function isWhitespace(char: string): boolean {
  return (
    char === " " ||
    char === "\t" ||
    char === "\v" ||
    char === "\r" ||
    char === "\n" ||
    char === "\f"
  );
}

/**
 * Characters that may follow a backslash as a single-character escape
 */
export const SIMPLE_ESCAPES: ReadonlySet<string> = new Set([
  "'",
  '"',
  "%",
  "?",
  "\\",
  "a",
  "b",
  "e",
  "f",
  "n",
  "r",
  "t",
  "v",
]);
