/**
 * Expression evaluator: `<operand> + <operand>` or `<operand> - <operand>`.
 *
 * The operator is found by trying each `+`/`-` and keeping the first split
 * where both sides parse, so the dashes inside an ISO date are never mistaken
 * for the operator. Operators with whitespace before them are tried first.
 * The wall clock is read once per call so "now" and "today" agree on both
 * sides.
 */

import type {
  CalcResult,
  Duration,
  Expression,
  Operand,
  Operator,
  Result,
} from "../types.js";
import { DURATION_UNITS, makeDuration, ok, fail } from "../types.js";
import { addToInstant, diffInstants } from "./calendar.js";
import {
  expressionTooLong,
  kindMismatch,
  operandParseError,
  resultOutOfRange,
  unrecognizedOperator,
  type EvalError,
  type ParseError,
  type ResultOutOfRangeError,
} from "./errors.js";
import { formatResult } from "./format.js";
import { parseOperand } from "./operand.js";

/** Longest accepted expression, after trimming. */
export const MAX_EXPRESSION_LENGTH = 256;

export type TimeSource = () => Date;

export const systemTime: TimeSource = () => new Date();

export interface EvaluateOptions {
  /** Wall-clock source for "now" and "today" (default: system time). */
  now?: TimeSource;
}

export interface Evaluation {
  expression: Expression;
  result: CalcResult;
  text: string;
}

// ---------------------------------------------------------------------------
// Duration helpers
// ---------------------------------------------------------------------------

export function negateDuration(d: Duration): Duration {
  const out = makeDuration();
  for (const unit of DURATION_UNITS) {
    out[unit] = d[unit] === 0 ? 0 : -d[unit];
  }
  return out;
}

/**
 * Component-wise sum or difference. No carrying between units. Fails when a
 * component leaves the safe integer range.
 */
export function combineDurations(
  a: Duration,
  operator: Operator,
  b: Duration,
): Result<Duration, ResultOutOfRangeError> {
  const out = makeDuration();
  for (const unit of DURATION_UNITS) {
    const value = operator === "+" ? a[unit] + b[unit] : a[unit] - b[unit];
    if (!Number.isSafeInteger(value)) {
      return fail(resultOutOfRange(`Result ${unit} are outside the supported range`));
    }
    out[unit] = value;
  }
  return ok(out);
}

// ---------------------------------------------------------------------------
// Kind pairing
// ---------------------------------------------------------------------------

export function applyOperator(
  left: Operand,
  operator: Operator,
  right: Operand,
): Result<CalcResult, EvalError> {
  if (left.kind === "instant") {
    if (right.kind === "duration") {
      return addToInstant(left, operator === "+" ? right : negateDuration(right));
    }
    if (operator === "-") return ok(diffInstants(left, right));
    return fail(kindMismatch("Cannot add two dates; subtract them to get a duration"));
  }

  if (right.kind === "duration") {
    return combineDurations(left, operator, right);
  }
  if (operator === "+") return addToInstant(right, left);
  return fail(kindMismatch("Cannot subtract a date from a duration"));
}

// ---------------------------------------------------------------------------
// Splitting
// ---------------------------------------------------------------------------

interface Split {
  index: number;
  operator: Operator;
  left: string;
  right: string;
}

function toOperator(ch: string): Operator | undefined {
  if (ch === "+" || ch === "-") return ch;
  return undefined;
}

/**
 * Every `+`/`-` with text on both sides: those with whitespace before them
 * first, then the bare ones, each group left to right.
 */
export function candidateSplits(input: string): Split[] {
  const spaced: Split[] = [];
  const bare: Split[] = [];
  for (let i = 0; i < input.length; i++) {
    const operator = toOperator(input[i]);
    if (!operator) continue;
    const left = input.slice(0, i).trim();
    const right = input.slice(i + 1).trim();
    if (!left || !right) continue;
    const split = { index: i, operator, left, right };
    if (/\s/.test(input.charAt(i - 1))) {
      spaced.push(split);
    } else {
      bare.push(split);
    }
  }
  return [...spaced, ...bare];
}

interface Attempt {
  split: Split;
  left: Result<Operand, ParseError>;
  right: Result<Operand, ParseError>;
}

function parsedSides(attempt: Attempt): number {
  return (attempt.left.ok ? 1 : 0) + (attempt.right.ok ? 1 : 0);
}

/**
 * Pick the failed split whose diagnostic is most useful: most sides parsed,
 * then the earliest in candidate order.
 */
function bestFailure(attempts: Attempt[]): Attempt {
  let best = attempts[0];
  for (const attempt of attempts.slice(1)) {
    if (parsedSides(attempt) > parsedSides(best)) best = attempt;
  }
  return best;
}

// ---------------------------------------------------------------------------
// Entry points
// ---------------------------------------------------------------------------

export function evaluate(
  expression: string,
  options: EvaluateOptions = {},
): Result<Evaluation, EvalError> {
  const input = expression.trim();
  if (input.length > MAX_EXPRESSION_LENGTH) {
    return fail(expressionTooLong(input.length, MAX_EXPRESSION_LENGTH));
  }
  const now = (options.now ?? systemTime)();

  const splits = candidateSplits(input);
  if (splits.length === 0) return fail(unrecognizedOperator(input));

  const attempts: Attempt[] = [];
  for (const split of splits) {
    const left = parseOperand(split.left, now);
    const right = parseOperand(split.right, now);

    if (left.ok && right.ok) {
      const parsed: Expression = {
        left: left.value,
        operator: split.operator,
        right: right.value,
      };
      const result = applyOperator(parsed.left, parsed.operator, parsed.right);
      if (!result.ok) return result;
      return ok({
        expression: parsed,
        result: result.value,
        text: formatResult(result.value),
      });
    }

    attempts.push({ split, left, right });
  }

  const { split, left, right } = bestFailure(attempts);
  if (!left.ok) return fail(operandParseError("left", split.left, left.error));
  if (!right.ok) return fail(operandParseError("right", split.right, right.error));
  return fail(unrecognizedOperator(input));
}

/**
 * Evaluate and return only the canonical result text.
 */
export function evaluateText(
  expression: string,
  options: EvaluateOptions = {},
): Result<string, EvalError> {
  const evaluation = evaluate(expression, options);
  return evaluation.ok ? ok(evaluation.value.text) : evaluation;
}
