/**
 * Calendar arithmetic on civil dates.
 *
 * Dates are converted to proleptic Gregorian day numbers (1970-01-01 = 0)
 * with integer math only, so no Date object or host time zone is involved.
 * Month and year steps clamp the day of month to the last valid day.
 */

import type { ClockTime, Duration, Instant, Result } from "../types.js";
import { makeDuration, ok, fail } from "../types.js";
import { resultOutOfRange, type ResultOutOfRangeError } from "./errors.js";

export const MIN_YEAR = 1;
export const MAX_YEAR = 9999;

const SECONDS_PER_DAY = 86_400;

export interface CivilDate {
  year: number;
  month: number;
  day: number;
}

// ---------------------------------------------------------------------------
// Month lengths
// ---------------------------------------------------------------------------

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

const MONTH_LENGTHS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return MONTH_LENGTHS[month - 1];
}

export function isValidDate(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) &&
    year >= MIN_YEAR &&
    year <= MAX_YEAR &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

// ---------------------------------------------------------------------------
// Day numbers
// ---------------------------------------------------------------------------

/**
 * Days since 1970-01-01. Years are shifted to start in March so the leap
 * day falls at the end of the cycle.
 */
export function toEpochDay({ year, month, day }: CivilDate): number {
  const y = month <= 2 ? year - 1 : year;
  const era = Math.floor(y / 400);
  const yearOfEra = y - era * 400;
  const marchMonth = (month + 9) % 12;
  const dayOfYear = Math.floor((153 * marchMonth + 2) / 5) + day - 1;
  const dayOfEra =
    yearOfEra * 365 +
    Math.floor(yearOfEra / 4) -
    Math.floor(yearOfEra / 100) +
    dayOfYear;
  return era * 146_097 + dayOfEra - 719_468;
}

export function fromEpochDay(epochDay: number): CivilDate {
  const z = epochDay + 719_468;
  const era = Math.floor(z / 146_097);
  const dayOfEra = z - era * 146_097;
  const yearOfEra = Math.floor(
    (dayOfEra -
      Math.floor(dayOfEra / 1460) +
      Math.floor(dayOfEra / 36_524) -
      Math.floor(dayOfEra / 146_096)) /
      365,
  );
  const dayOfYear =
    dayOfEra -
    (365 * yearOfEra + Math.floor(yearOfEra / 4) - Math.floor(yearOfEra / 100));
  const marchMonth = Math.floor((5 * dayOfYear + 2) / 153);
  const day = dayOfYear - Math.floor((153 * marchMonth + 2) / 5) + 1;
  const month = marchMonth < 10 ? marchMonth + 3 : marchMonth - 9;
  const year = yearOfEra + era * 400 + (month <= 2 ? 1 : 0);
  return { year, month, day };
}

// ---------------------------------------------------------------------------
// Steps
// ---------------------------------------------------------------------------

/**
 * Move by whole months, clamping the day (Jan 31 + 1 month -> Feb 28/29).
 */
export function addMonthsClamped(date: CivilDate, months: number): CivilDate {
  const index = date.year * 12 + (date.month - 1) + months;
  const year = Math.floor(index / 12);
  const month = index - year * 12 + 1;
  const day = Math.min(date.day, daysInMonth(year, month));
  return { year, month, day };
}

export function addDays(date: CivilDate, days: number): CivilDate {
  return fromEpochDay(toEpochDay(date) + days);
}

function secondsOfDay(time: ClockTime | undefined): number {
  if (!time) return 0;
  return time.hour * 3600 + time.minute * 60 + time.second;
}

function clockFromSeconds(seconds: number): ClockTime {
  return {
    hour: Math.floor(seconds / 3600),
    minute: Math.floor((seconds % 3600) / 60),
    second: seconds % 60,
  };
}

// ---------------------------------------------------------------------------
// Instant arithmetic
// ---------------------------------------------------------------------------

/**
 * Apply a duration to an instant: years, then months, then weeks and days
 * as one day count, then the clock units with carry across days.
 */
export function addToInstant(
  instant: Instant,
  duration: Duration,
): Result<Instant, ResultOutOfRangeError> {
  let date: CivilDate = { year: instant.year, month: instant.month, day: instant.day };
  date = addMonthsClamped(date, duration.years * 12);
  date = addMonthsClamped(date, duration.months);

  let epochDay = toEpochDay(date) + duration.weeks * 7 + duration.days;

  const clockSeconds =
    duration.hours * 3600 + duration.minutes * 60 + duration.seconds;
  let time: ClockTime | undefined;
  if (instant.time !== undefined || clockSeconds !== 0) {
    const total = secondsOfDay(instant.time) + clockSeconds;
    const carry = Math.floor(total / SECONDS_PER_DAY);
    epochDay += carry;
    time = clockFromSeconds(total - carry * SECONDS_PER_DAY);
  }

  const end = fromEpochDay(epochDay);
  // NaN fails both bounds
  if (!(end.year >= MIN_YEAR && end.year <= MAX_YEAR)) {
    return fail(
      resultOutOfRange(
        `Result year ${end.year} is outside the supported range ${MIN_YEAR}-${MAX_YEAR}`,
      ),
    );
  }

  const value: Instant = { kind: "instant", ...end };
  return ok(time ? { ...value, time } : value);
}

function withSign(value: number, sign: number): number {
  return sign < 0 && value !== 0 ? -value : value;
}

/**
 * Elapsed time from `b` to `a` (a - b) in days, plus hours, minutes and
 * seconds when either side carries a time. All parts share one sign.
 */
export function diffInstants(a: Instant, b: Instant): Duration {
  const total =
    (toEpochDay(a) - toEpochDay(b)) * SECONDS_PER_DAY +
    secondsOfDay(a.time) -
    secondsOfDay(b.time);

  const sign = total < 0 ? -1 : 1;
  const abs = Math.abs(total);
  const days = withSign(Math.floor(abs / SECONDS_PER_DAY), sign);

  if (a.time === undefined && b.time === undefined) {
    return makeDuration({ days });
  }

  const rest = clockFromSeconds(abs % SECONDS_PER_DAY);
  return makeDuration({
    days,
    hours: withSign(rest.hour, sign),
    minutes: withSign(rest.minute, sign),
    seconds: withSign(rest.second, sign),
  });
}
