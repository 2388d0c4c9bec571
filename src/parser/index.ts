/**
 * Parser Module
 *
 * Exports the call-site scanner and the pieces it is built from.
 */

export { parse, type ParseResult } from "./parser";
export {
  Args,
  type Arg,
  type Cast,
  type FormatString,
  type FormatStringResult,
} from "./args";
export { Specifiers } from "./specifiers";
export { matchFormat } from "./matcher";
