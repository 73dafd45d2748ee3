/**
 * Absolute date/datetime parser and relative keywords.
 *
 * Supports expressions like:
 *   today              - current local date, no time
 *   now                - current local datetime, second precision
 *   2024-07-10         - ISO date
 *   July/4/2024        - month name (full or abbreviated) / day / year
 *   06/10/24           - month / day / two- or four-digit year
 *   06/10/24 15:33     - any date followed by HH:MM[:SS] or H:MM[:SS] AM|PM
 *
 * Two-digit years pivot at 69: 00-68 -> 2000-2068, 69-99 -> 1969-1999.
 */

import type { ClockTime, Instant, Result } from "../types.js";
import { ok, fail } from "../types.js";
import { daysInMonth, MAX_YEAR, MIN_YEAR } from "./calendar.js";
import { parseError, type ParseError } from "./errors.js";

const ISO_DATE_RE = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;
const NAMED_DATE_RE = /^([a-z]+)\/(\d{1,2})\/(\d{4}|\d{2})$/i;
const NUMERIC_DATE_RE = /^(\d{1,2})\/(\d{1,2})\/(\d{4}|\d{2})$/;
const TIME_RE = /^(\d{1,2}):(\d{2})(?::(\d{2}))?(?:\s*([ap]m))?$/i;

export const TWO_DIGIT_YEAR_PIVOT = 69;

const MONTH_NAMES = [
  "january",
  "february",
  "march",
  "april",
  "may",
  "june",
  "july",
  "august",
  "september",
  "october",
  "november",
  "december",
];

export const DATE_FORMATS = [
  "YYYY-MM-DD",
  "Month/DD/YYYY",
  "Month/DD/YY",
  "Mon/DD/YYYY",
  "Mon/DD/YY",
  "MM/DD/YYYY",
  "MM/DD/YY",
] as const;

export const TIME_FORMATS = ["HH:MM", "HH:MM:SS", "H:MM AM", "H:MM:SS PM"] as const;

// ---------------------------------------------------------------------------
// Keywords
// ---------------------------------------------------------------------------

export type Keyword = "today" | "now";

export function isKeyword(text: string): text is Keyword {
  return text === "today" || text === "now";
}

/**
 * Resolve "today" or "now" against a wall-clock reading (local time).
 */
export function resolveKeyword(keyword: Keyword, now: Date): Instant {
  const date: Instant = {
    kind: "instant",
    year: now.getFullYear(),
    month: now.getMonth() + 1,
    day: now.getDate(),
  };
  if (keyword === "today") return date;
  return {
    ...date,
    time: {
      hour: now.getHours(),
      minute: now.getMinutes(),
      second: now.getSeconds(),
    },
  };
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

export function expandTwoDigitYear(yy: number): number {
  return yy < TWO_DIGIT_YEAR_PIVOT ? 2000 + yy : 1900 + yy;
}

function parseYear(digits: string): number {
  const n = parseInt(digits, 10);
  return digits.length === 2 ? expandTwoDigitYear(n) : n;
}

/**
 * Month number for a full English month name or its first three letters
 * ("sept" is also accepted). Returns undefined for anything else.
 */
export function monthFromName(name: string): number | undefined {
  const lower = name.toLowerCase();
  if (lower === "sept") return 9;
  const index = MONTH_NAMES.findIndex(
    (full) => full === lower || (lower.length === 3 && full.startsWith(lower)),
  );
  return index === -1 ? undefined : index + 1;
}

interface DateFields {
  year: number;
  month: number;
  day: number;
}

type DateMatch =
  | { status: "matched"; fields: DateFields }
  | { status: "unknown_month"; name: string }
  | { status: "no_match" };

function matchDate(text: string): DateMatch {
  const iso = text.match(ISO_DATE_RE);
  if (iso) {
    const [, y, m, d] = iso;
    return {
      status: "matched",
      fields: { year: parseInt(y, 10), month: parseInt(m, 10), day: parseInt(d, 10) },
    };
  }

  const named = text.match(NAMED_DATE_RE);
  if (named) {
    const [, name, d, y] = named;
    const month = monthFromName(name);
    if (month === undefined) return { status: "unknown_month", name };
    return {
      status: "matched",
      fields: { year: parseYear(y), month, day: parseInt(d, 10) },
    };
  }

  const numeric = text.match(NUMERIC_DATE_RE);
  if (numeric) {
    const [, m, d, y] = numeric;
    return {
      status: "matched",
      fields: { year: parseYear(y), month: parseInt(m, 10), day: parseInt(d, 10) },
    };
  }

  return { status: "no_match" };
}

function checkDate(input: string, { year, month, day }: DateFields): ParseError | null {
  if (year < MIN_YEAR || year > MAX_YEAR) {
    return parseError("InvalidDateValue", input, `year ${year} is out of range`);
  }
  if (month < 1 || month > 12) {
    return parseError("InvalidDateValue", input, `month ${month} is out of range`);
  }
  const last = daysInMonth(year, month);
  if (day < 1 || day > last) {
    return parseError(
      "InvalidDateValue",
      input,
      `day ${day} is out of range for ${year}-${String(month).padStart(2, "0")} (1-${last})`,
    );
  }
  return null;
}

/**
 * Parse a time of day. Returns null when the text is not time-shaped.
 */
export function parseTime(
  input: string,
  text: string,
): Result<ClockTime, ParseError> | null {
  const match = text.match(TIME_RE);
  if (!match) return null;

  const [, h, m, s, meridiem] = match;
  let hour = parseInt(h, 10);
  const minute = parseInt(m, 10);
  const second = s ? parseInt(s, 10) : 0;

  if (meridiem) {
    if (hour < 1 || hour > 12) {
      return fail(parseError("InvalidDateValue", input, `hour ${hour} is not valid with ${meridiem.toUpperCase()}`));
    }
    const pm = meridiem.toLowerCase() === "pm";
    hour = (hour % 12) + (pm ? 12 : 0);
  } else if (hour > 23) {
    return fail(parseError("InvalidDateValue", input, `hour ${hour} is out of range`));
  }
  if (minute > 59) {
    return fail(parseError("InvalidDateValue", input, `minute ${minute} is out of range`));
  }
  if (second > 59) {
    return fail(parseError("InvalidDateValue", input, `second ${second} is out of range`));
  }

  return ok({ hour, minute, second });
}

// ---------------------------------------------------------------------------
// Instant parsing
// ---------------------------------------------------------------------------

/**
 * Parse a keyword, an absolute date, or an absolute date followed by a time.
 */
export function parseInstant(text: string, now: Date): Result<Instant, ParseError> {
  const input = text.trim();
  const lower = input.toLowerCase();
  if (isKeyword(lower)) return ok(resolveKeyword(lower, now));

  const invalidFormat = fail(
    parseError(
      "InvalidDateFormat",
      input,
      `"${input}" does not match a date format (${DATE_FORMATS.join(", ")}), optionally followed by a time`,
    ),
  );

  const [datePart, ...rest] = input.split(/\s+/);
  const timePart = rest.join(" ");

  const match = matchDate(datePart);
  if (match.status === "no_match") return invalidFormat;
  if (match.status === "unknown_month") {
    return fail(parseError("InvalidDateFormat", input, `unknown month name "${match.name}"`));
  }

  let time: ClockTime | undefined;
  if (timePart) {
    const parsedTime = parseTime(input, timePart);
    if (!parsedTime) return invalidFormat;
    if (!parsedTime.ok) return parsedTime;
    time = parsedTime.value;
  }

  const invalid = checkDate(input, match.fields);
  if (invalid) return fail(invalid);

  const date: Instant = { kind: "instant", ...match.fields };
  return ok(time ? { ...date, time } : date);
}
