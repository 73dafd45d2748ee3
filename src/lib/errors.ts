/**
 * Error values produced by the parsers and the evaluator.
 *
 * Errors are plain tagged objects returned inside a Result, never thrown.
 * Every error carries a `message` suitable for a single diagnostic line.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ParseErrorKind =
  | "UnrecognizedOperand"
  | "InvalidDurationToken"
  | "EmptyDuration"
  | "InvalidDateFormat"
  | "InvalidDateValue";

export interface ParseError {
  kind: ParseErrorKind;
  input: string;
  message: string;
}

export type Side = "left" | "right";

export interface OperandParseError {
  kind: "OperandParseError";
  side: Side;
  operand: string;
  cause: ParseError;
  message: string;
}

export interface UnrecognizedOperatorError {
  kind: "UnrecognizedOperator";
  input: string;
  message: string;
}

export interface KindMismatchError {
  kind: "KindMismatch";
  message: string;
}

export interface ResultOutOfRangeError {
  kind: "ResultOutOfRange";
  message: string;
}

export interface ExpressionTooLongError {
  kind: "ExpressionTooLong";
  length: number;
  message: string;
}

export type EvalError =
  | OperandParseError
  | UnrecognizedOperatorError
  | KindMismatchError
  | ResultOutOfRangeError
  | ExpressionTooLongError;

export type EvalErrorKind = EvalError["kind"];

// ---------------------------------------------------------------------------
// Constructors
// ---------------------------------------------------------------------------

export function parseError(
  kind: ParseErrorKind,
  input: string,
  message: string,
): ParseError {
  return { kind, input, message };
}

export function operandParseError(
  side: Side,
  operand: string,
  cause: ParseError,
): OperandParseError {
  return {
    kind: "OperandParseError",
    side,
    operand,
    cause,
    message: `Could not parse ${side} operand "${operand}": ${cause.message}`,
  };
}

export function unrecognizedOperator(input: string): UnrecognizedOperatorError {
  return {
    kind: "UnrecognizedOperator",
    input,
    message: `Expected "<operand> + <operand>" or "<operand> - <operand>", got "${input}"`,
  };
}

export function kindMismatch(message: string): KindMismatchError {
  return { kind: "KindMismatch", message };
}

export function resultOutOfRange(message: string): ResultOutOfRangeError {
  return { kind: "ResultOutOfRange", message };
}


export function expressionTooLong(length: number, limit: number): ExpressionTooLongError {
  return {
    kind: "ExpressionTooLong",
    length,
    message: `Expression is ${length} characters long; the limit is ${limit}`,
  };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

/**
 * One diagnostic line for an error. Operands quoted from multi-line input
 * have their line breaks folded into single spaces.
 */
export function describeError(error: EvalError | ParseError): string {
  return error.message.replace(/\s*[\r\n]+\s*/g, " ");
}
