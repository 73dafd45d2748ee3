/**
 * Operand recognition: turns one side of an expression into an Instant or
 * a Duration.
 *
 * Grammars are tried in priority order: keyword, duration, datetime/date.
 * When none matches, the most specific failure is reported.
 */

import type { Operand, Result } from "../types.js";
import { ok, fail } from "../types.js";
import { isKeyword, parseInstant, resolveKeyword } from "./date-parser.js";
import { scanDuration } from "./duration-parser.js";
import { parseError, type ParseError } from "./errors.js";

const DATE_SHAPE_RE = /^(?:\d{1,4}|[a-z]+)[-/]/i;

export function parseOperand(text: string, now: Date): Result<Operand, ParseError> {
  const input = text.trim();
  const lower = input.toLowerCase();

  if (isKeyword(lower)) return ok(resolveKeyword(lower, now));

  const duration = scanDuration(input);
  if (duration.result.ok) return duration.result;

  const instant = parseInstant(input, now);
  if (instant.ok) return instant;

  if (DATE_SHAPE_RE.test(input)) return instant;
  if (duration.pairs > 0) return duration.result;

  return fail(
    parseError(
      "UnrecognizedOperand",
      input,
      input ? `"${input}" is not a date, datetime or duration` : "missing operand",
    ),
  );
}
