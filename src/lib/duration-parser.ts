/**
 * Compound duration parser.
 *
 * Accepts one or more <integer><unit> pairs, with optional whitespace:
 *   1y6mo10d
 *   2 weeks 3 days
 *   3h 15m
 *
 * Units are read as the whole run of letters after the number and looked
 * up exactly, so "mo" (months) and "m" (minutes) never collide. Repeated
 * units add up. Weeks are folded into days. Every total must stay a safe
 * integer.
 */

import type { Duration, DurationUnit, Result } from "../types.js";
import { makeDuration, ok, fail } from "../types.js";
import { parseError, type ParseError } from "./errors.js";

const PAIR_RE = /^(\d+)\s*([a-z]+)\s*/i;

export const UNIT_ALIASES: Readonly<Record<string, DurationUnit>> = {
  y: "years",
  yr: "years",
  yrs: "years",
  year: "years",
  years: "years",
  mo: "months",
  mos: "months",
  mon: "months",
  month: "months",
  months: "months",
  w: "weeks",
  wk: "weeks",
  wks: "weeks",
  week: "weeks",
  weeks: "weeks",
  d: "days",
  day: "days",
  days: "days",
  h: "hours",
  hr: "hours",
  hrs: "hours",
  hour: "hours",
  hours: "hours",
  m: "minutes",
  min: "minutes",
  mins: "minutes",
  minute: "minutes",
  minutes: "minutes",
  s: "seconds",
  sec: "seconds",
  secs: "seconds",
  second: "seconds",
  seconds: "seconds",
};

export function resolveUnit(word: string): DurationUnit | undefined {
  const key = word.toLowerCase();
  return Object.prototype.hasOwnProperty.call(UNIT_ALIASES, key)
    ? UNIT_ALIASES[key]
    : undefined;
}

export interface DurationScan {
  /** Number of <integer><letters> pairs consumed, including unknown units. */
  pairs: number;
  result: Result<Duration, ParseError>;
}

/**
 * Scan a duration and report how far the grammar got, so callers can tell
 * "not a duration at all" from "a duration with a bad token".
 */
export function scanDuration(text: string): DurationScan {
  const input = text.trim();
  const totals = makeDuration();
  let rest = input;
  let pairs = 0;

  for (let match = rest.match(PAIR_RE); match; match = rest.match(PAIR_RE)) {
    const [consumed, amount, word] = match;
    pairs++;
    const unit = resolveUnit(word);
    if (!unit) {
      return {
        pairs,
        result: fail(
          parseError(
            "InvalidDurationToken",
            input,
            `unsupported duration unit "${word}" in "${input}"`,
          ),
        ),
      };
    }
    const value = parseInt(amount, 10);
    const target: DurationUnit = unit === "weeks" ? "days" : unit;
    const total = totals[target] + (unit === "weeks" ? value * 7 : value);
    if (!Number.isSafeInteger(total)) {
      return {
        pairs,
        result: fail(
          parseError(
            "InvalidDurationToken",
            input,
            `amount "${amount}" is too large in "${input}"`,
          ),
        ),
      };
    }
    totals[target] = total;
    rest = rest.slice(consumed.length);
  }

  if (pairs === 0) {
    return {
      pairs,
      result: fail(
        parseError("EmptyDuration", input, `"${input}" contains no <number><unit> pairs`),
      ),
    };
  }

  if (rest.length > 0) {
    return {
      pairs,
      result: fail(
        parseError(
          "InvalidDurationToken",
          input,
          `unexpected "${rest}" after duration in "${input}"`,
        ),
      ),
    };
  }

  return { pairs, result: ok(totals) };
}

export function parseDuration(text: string): Result<Duration, ParseError> {
  return scanDuration(text).result;
}
