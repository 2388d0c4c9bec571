/**
 * Matcher
 *
 * Pairs the specifiers of a format string with the arguments that follow it.
 * Count mismatches end the call at once; a cast mismatch marks the call as
 * failed but matching goes on, so every cast mismatch in the call is reported.
 */

import type { Specifier } from "../lexer/tokens";
import type { Span } from "../utils/span";
import {
  type FormatError,
  excessArgs,
  excessSpecifiers,
  specifierCastMismatch,
} from "../diagnostics/errors";
import {
  type FormatValue,
  type Interpolation,
  type InterpolationPair,
  interpolation,
} from "../ir/ir";
import type { Arg, Args } from "./args";
import { Specifiers } from "./specifiers";

/**
 * Outcome of taking one item from each side.
 */
type Step =
  | { kind: "pair"; specifier: Specifier; arg: Arg }
  | { kind: "excessSpecifier"; specifier: Specifier }
  | { kind: "excessArg"; arg: Arg }
  | { kind: "done" };

/**
 * Either still collecting pairs, or known to be invalid and only looking
 * for further cast mismatches.
 */
type MatchState =
  | { kind: "building"; pairs: InterpolationPair<FormatValue>[] }
  | { kind: "failed" };

function step(specifiers: Specifiers, args: Args): Step {
  const specifier = specifiers.next();
  const arg = args.next();

  if (specifier !== null && arg !== null) return { kind: "pair", specifier, arg };
  if (specifier !== null) return { kind: "excessSpecifier", specifier };
  if (arg !== null) return { kind: "excessArg", arg };
  return { kind: "done" };
}

/**
 * Parse the format string and the arguments after it. On failure the errors
 * are pushed to `errors` and null is returned; either way `args` is fully
 * consumed, leaving the source lexer past the end of the call.
 */
export function matchFormat(
  source: string,
  args: Args,
  errors: FormatError[]
): Interpolation<FormatValue> | null {
  const formatResult = args.nextFormatString();
  if (!formatResult.ok) {
    errors.push(formatResult.error);
    args.shortCircuit();
    return null;
  }

  const format = formatResult.format;
  const specifiers = new Specifiers(source, format.content);
  let state: MatchState = { kind: "building", pairs: [] };

  for (;;) {
    const next = step(specifiers, args);

    switch (next.kind) {
      case "pair":
        state = matchPair(state, next.specifier, next.arg, specifiers, errors);
        break;

      case "excessSpecifier": {
        const argsSpan = args.shortCircuit().span;
        const count = specifiers.drain() + 1;
        errors.push(excessSpecifiers(format.span, argsSpan, count));
        return null;
      }

      case "excessArg": {
        const rest = args.shortCircuit();
        errors.push(excessArgs(format.span, rest.span, rest.count + 1));
        return null;
      }

      case "done":
        if (state.kind === "failed") {
          return null;
        }
        return interpolation(state.pairs, specifiers.remainder);
    }
  }
}

function matchPair(
  state: MatchState,
  specifier: Specifier,
  arg: Arg,
  specifiers: Specifiers,
  errors: FormatError[]
): MatchState {
  const cast = arg.cast;

  // Uncast arguments are never checked
  if (cast === null) {
    return record(state, specifiers.before, arg.span, false, specifier);
  }

  if (cast.type === specifier.type) {
    return record(state, specifiers.before, arg.span, true, specifier);
  }

  errors.push(
    specifierCastMismatch(specifiers.span(), specifier.type, cast.span, cast.type)
  );
  return { kind: "failed" };
}

function record(
  state: MatchState,
  chunk: Span,
  arg: Span,
  typeChecked: boolean,
  specifier: Specifier
): MatchState {
  if (state.kind === "building") {
    state.pairs.push({ chunk, value: { arg, typeChecked, specifier } });
  }
  return state;
}
