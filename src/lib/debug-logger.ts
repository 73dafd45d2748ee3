/**
 * Debug logger for dtcalc.
 *
 * Captures tool calls and evaluations as JSONL when DTCALC_DEBUG=true.
 * Returns null when disabled so callers skip logging entirely.
 */

import { writeFile, appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import { homedir } from "node:os";
import { randomBytes } from "node:crypto";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DebugLoggerOptions {
  logDir?: string; // defaults to ~/.dtcalc/logs/
}

export interface ToolLogFields {
  tool: string;
  params: Record<string, unknown>;
  durationMs: number;
  ok: boolean;
  error?: string;
}

export interface EvalLogFields {
  expression: string;
  source: "cli" | "repl" | "mcp";
  durationMs: number;
  ok: boolean;
  result?: string;
  errorKind?: string;
  error?: string;
}

export interface LogEvent {
  ts: string;
  cat: "tool" | "eval";
  [key: string]: unknown;
}

export const DEFAULT_LOG_DIR = join(homedir(), ".dtcalc", "logs");

// ---------------------------------------------------------------------------
// DebugLogger
// ---------------------------------------------------------------------------

export class DebugLogger {
  private logPath: string | null = null;
  private logDir: string;
  private pending: Promise<void> = Promise.resolve();

  constructor(options?: DebugLoggerOptions) {
    this.logDir = options?.logDir ?? DEFAULT_LOG_DIR;
  }

  private async getLogPath(): Promise<string> {
    if (this.logPath) return this.logPath;

    await mkdir(this.logDir, { recursive: true });

    const ts = new Date()
      .toISOString()
      .replace(/[:.]/g, "-")
      .replace("T", "-")
      .replace("Z", "");
    const rand = randomBytes(2).toString("hex");
    const path = join(this.logDir, `session-${ts}-${rand}.jsonl`);

    await writeFile(path, "");
    this.logPath = path;
    return path;
  }

  private append(event: LogEvent): void {
    // Fire-and-forget; writes are chained so lines keep their order
    this.pending = this.pending
      .then(() => this.getLogPath())
      .then((path) => appendFile(path, JSON.stringify(event) + "\n"))
      .catch((error: unknown) => {
        console.error("[dtcalc] Debug log write failed:", error);
      });
  }

  logTool(fields: ToolLogFields): void {
    this.append({
      ts: new Date().toISOString(),
      cat: "tool",
      tool: fields.tool,
      params: fields.params,
      durationMs: fields.durationMs,
      ok: fields.ok,
      ...(fields.error ? { error: fields.error } : {}),
    });
  }

  logEvaluation(fields: EvalLogFields): void {
    this.append({
      ts: new Date().toISOString(),
      cat: "eval",
      expression: fields.expression,
      source: fields.source,
      durationMs: fields.durationMs,
      ok: fields.ok,
      ...(fields.result !== undefined ? { result: fields.result } : {}),
      ...(fields.errorKind ? { errorKind: fields.errorKind } : {}),
      ...(fields.error ? { error: fields.error } : {}),
    });
  }

  /** Resolves once every queued line has been written. */
  flush(): Promise<void> {
    return this.pending;
  }

  /** Get the current log file path (for testing). */
  getSessionLogPath(): string | null {
    return this.logPath;
  }
}

// ---------------------------------------------------------------------------
// Factory & Wrapper
// ---------------------------------------------------------------------------

/**
 * Create a DebugLogger if DTCALC_DEBUG=true, otherwise null.
 */
export function createDebugLogger(
  options?: DebugLoggerOptions,
): DebugLogger | null {
  if (process.env.DTCALC_DEBUG !== "true") return null;
  return new DebugLogger(options);
}

/**
 * Tool handlers report failures by returning `{ isError: true }`.
 */
function isErrorResult(result: unknown): boolean {
  return (
    typeof result === "object" &&
    result !== null &&
    "isError" in result &&
    result.isError === true
  );
}

/**
 * Wrap a tool handler with debug logging.
 * When logger is null, calls handler directly.
 */
export async function withLogging<T>(
  logger: DebugLogger | null,
  toolName: string,
  params: Record<string, unknown>,
  handler: () => Promise<T>,
): Promise<T> {
  if (!logger) return handler();

  const t0 = Date.now();
  try {
    const result = await handler();
    logger.logTool({
      tool: toolName,
      params,
      durationMs: Date.now() - t0,
      ok: !isErrorResult(result),
    });
    return result;
  } catch (error) {
    logger.logTool({
      tool: toolName,
      params,
      durationMs: Date.now() - t0,
      ok: false,
      error: error instanceof Error ? error.message : String(error),
    });
    throw error;
  }
}
