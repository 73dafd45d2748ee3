/**
 * MCP tools for date/duration arithmetic.
 *
 * Provides `dtcalc__evaluate` (full expression), `dtcalc__parse_operand`
 * (one operand, structured) and `dtcalc__formats` (accepted input syntax).
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { toolSuccess, toolError, type ToolResult } from "../types.js";
import { DATE_FORMATS, TIME_FORMATS, TWO_DIGIT_YEAR_PIVOT } from "../lib/date-parser.js";
import { UNIT_ALIASES } from "../lib/duration-parser.js";
import { withLogging, type DebugLogger } from "../lib/debug-logger.js";
import { describeError } from "../lib/errors.js";
import { systemTime, type TimeSource } from "../lib/evaluator.js";
import { formatResult } from "../lib/format.js";
import { parseOperand } from "../lib/operand.js";
import { runEvaluation } from "../lib/run.js";

export interface CalcToolDeps {
  logger: DebugLogger | null;
  now?: TimeSource;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export function evaluateTool(
  args: { expression: string },
  deps: CalcToolDeps,
): ToolResult {
  const outcome = runEvaluation(args.expression, {
    logger: deps.logger,
    source: "mcp",
    now: deps.now,
  });
  if (!outcome.ok) return toolError(describeError(outcome.error));

  const { result, text } = outcome.value;
  return toolSuccess({
    expression: args.expression.trim(),
    kind: result.kind,
    result: text,
    value: result,
  });
}

export function parseOperandTool(
  args: { operand: string },
  deps: CalcToolDeps,
): ToolResult {
  const parsed = parseOperand(args.operand, (deps.now ?? systemTime)());
  if (!parsed.ok) {
    return toolError(`${parsed.error.kind}: ${describeError(parsed.error)}`);
  }
  return toolSuccess({
    operand: args.operand.trim(),
    kind: parsed.value.kind,
    formatted: formatResult(parsed.value),
    value: parsed.value,
  });
}

export function formatsTool(): ToolResult {
  const units: Record<string, string[]> = {};
  for (const [alias, unit] of Object.entries(UNIT_ALIASES)) {
    (units[unit] ??= []).push(alias);
  }
  return toolSuccess({
    keywords: ["today", "now"],
    dateFormats: DATE_FORMATS,
    timeFormats: TIME_FORMATS,
    twoDigitYears: `00-${TWO_DIGIT_YEAR_PIVOT - 1} -> 20xx, ${TWO_DIGIT_YEAR_PIVOT}-99 -> 19xx`,
    durationUnits: units,
    expression: "<operand> + <operand> | <operand> - <operand>",
  });
}

// ---------------------------------------------------------------------------
// Register Calc Tools
// ---------------------------------------------------------------------------

export function registerCalcTools(server: McpServer, deps: CalcToolDeps): void {
  // -------------------------------------------------------------------------
  // dtcalc__evaluate
  // -------------------------------------------------------------------------
  server.tool(
    "dtcalc__evaluate",
    "Evaluate a date/duration expression such as 'today + 3d', '2024-07-10 - 2023-07-10' or '1y6mo + 2 weeks'. Returns: kind ('instant' or 'duration'), the canonical result text, and the structured value.",
    {
      expression: z
        .string()
        .min(1)
        .describe("Expression of the form '<operand> + <operand>' or '<operand> - <operand>'"),
    },
    async (args) =>
      withLogging(deps.logger, "dtcalc__evaluate", args, async () =>
        evaluateTool(args, deps),
      ),
  );

  // -------------------------------------------------------------------------
  // dtcalc__parse_operand
  // -------------------------------------------------------------------------
  server.tool(
    "dtcalc__parse_operand",
    "Parse a single operand (date, datetime, 'today', 'now' or a duration like '2 weeks 3 days') without evaluating an expression. Returns: kind, canonical text, and the structured value.",
    {
      operand: z
        .string()
        .min(1)
        .describe("A date, datetime, keyword or duration"),
    },
    async (args) =>
      withLogging(deps.logger, "dtcalc__parse_operand", args, async () =>
        parseOperandTool(args, deps),
      ),
  );

  // -------------------------------------------------------------------------
  // dtcalc__formats
  // -------------------------------------------------------------------------
  server.tool(
    "dtcalc__formats",
    "List the accepted date formats, time formats, keywords and duration unit aliases.",
    {},
    async () => withLogging(deps.logger, "dtcalc__formats", {}, async () => formatsTool()),
  );
}
