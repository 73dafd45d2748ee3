/**
 * Shared types for the date calculator.
 *
 * Value types for parsed operands and results, the Result union used by
 * every parser, and the MCP tool response helpers.
 */

// ---------------------------------------------------------------------------
// Calendar values
// ---------------------------------------------------------------------------

export interface ClockTime {
  hour: number;
  minute: number;
  second: number;
}

/**
 * A civil date, optionally with a time of day. No time zone.
 * Without `time` the value is a pure date.
 */
export interface Instant {
  kind: "instant";
  year: number;
  month: number; // 1-12
  day: number;
  time?: ClockTime;
}

/**
 * Signed structured duration. Calendar units (years..days) are applied
 * with calendar rules; clock units (hours..seconds) are fixed length.
 */
export interface Duration {
  kind: "duration";
  years: number;
  months: number;
  weeks: number;
  days: number;
  hours: number;
  minutes: number;
  seconds: number;
}

export type DurationUnit = Exclude<keyof Duration, "kind">;

export const DURATION_UNITS: readonly DurationUnit[] = [
  "years",
  "months",
  "weeks",
  "days",
  "hours",
  "minutes",
  "seconds",
];

export type Operand = Instant | Duration;

export type CalcResult = Instant | Duration;

export type Operator = "+" | "-";

export interface Expression {
  left: Operand;
  operator: Operator;
  right: Operand;
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Build a Duration with every unit defaulting to zero.
 */
export function makeDuration(parts: Partial<Record<DurationUnit, number>> = {}): Duration {
  return {
    kind: "duration",
    years: parts.years ?? 0,
    months: parts.months ?? 0,
    weeks: parts.weeks ?? 0,
    days: parts.days ?? 0,
    hours: parts.hours ?? 0,
    minutes: parts.minutes ?? 0,
    seconds: parts.seconds ?? 0,
  };
}

// ---------------------------------------------------------------------------
// MCP Tool Response Helpers
// ---------------------------------------------------------------------------

export interface ToolResult {
  [key: string]: unknown;
  content: Array<{
    type: "text";
    text: string;
  }>;
  isError?: boolean;
}

export function toolSuccess(data: unknown): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

export function toolError(message: string): ToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify({ error: message }) }],
    isError: true,
  };
}
