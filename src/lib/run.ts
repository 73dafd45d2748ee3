/**
 * Evaluate an expression on behalf of a shell (CLI, prompt or MCP tool)
 * and record it in the debug log when one is active.
 */

import type { Result } from "../types.js";
import type { DebugLogger, EvalLogFields } from "./debug-logger.js";
import type { EvalError } from "./errors.js";
import { evaluate, type EvaluateOptions, type Evaluation } from "./evaluator.js";

export interface RunOptions extends EvaluateOptions {
  logger?: DebugLogger | null;
  source: EvalLogFields["source"];
}

export function runEvaluation(
  expression: string,
  options: RunOptions,
): Result<Evaluation, EvalError> {
  const { logger, source, ...evaluateOptions } = options;
  if (!logger) return evaluate(expression, evaluateOptions);

  const t0 = Date.now();
  const outcome = evaluate(expression, evaluateOptions);
  logger.logEvaluation({
    expression,
    source,
    durationMs: Date.now() - t0,
    ok: outcome.ok,
    ...(outcome.ok
      ? { result: outcome.value.text }
      : { errorKind: outcome.error.kind, error: outcome.error.message }),
  });
  return outcome;
}
