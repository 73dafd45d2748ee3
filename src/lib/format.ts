/**
 * Canonical text for results.
 */

import type { CalcResult, Duration, DurationUnit, Instant } from "../types.js";
import { DURATION_UNITS } from "../types.js";

const SINGULAR: Record<DurationUnit, string> = {
  years: "year",
  months: "month",
  weeks: "week",
  days: "day",
  hours: "hour",
  minutes: "minute",
  seconds: "second",
};

function pad(n: number, width = 2): string {
  return String(n).padStart(width, "0");
}

export function formatInstant(instant: Instant): string {
  const date = `${pad(instant.year, 4)}-${pad(instant.month)}-${pad(instant.day)}`;
  if (!instant.time) return date;
  const { hour, minute, second } = instant.time;
  return `${date} ${pad(hour)}:${pad(minute)}:${pad(second)}`;
}

export function formatDuration(duration: Duration): string {
  const parts = DURATION_UNITS.filter((unit) => duration[unit] !== 0).map(
    (unit) => {
      const n = duration[unit];
      return `${n} ${Math.abs(n) === 1 ? SINGULAR[unit] : unit}`;
    },
  );
  return parts.length > 0 ? parts.join(" ") : "0 days";
}

export function formatResult(result: CalcResult): string {
  return result.kind === "instant"
    ? formatInstant(result)
    : formatDuration(result);
}
