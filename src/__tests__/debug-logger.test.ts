import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  DebugLogger,
  createDebugLogger,
  withLogging,
} from "../lib/debug-logger.js";
import { runEvaluation } from "../lib/run.js";
import { toolError } from "../types.js";

async function readEvents(logger: DebugLogger): Promise<Array<Record<string, unknown>>> {
  await logger.flush();
  const path = logger.getSessionLogPath();
  if (!path) throw new Error("expected a session log");
  const content = await readFile(path, "utf-8");
  return content
    .trim()
    .split("\n")
    .map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe("createDebugLogger", () => {
  const origDebug = process.env.DTCALC_DEBUG;

  afterEach(() => {
    if (origDebug === undefined) {
      delete process.env.DTCALC_DEBUG;
    } else {
      process.env.DTCALC_DEBUG = origDebug;
    }
  });

  it("returns null when DTCALC_DEBUG is not set", () => {
    delete process.env.DTCALC_DEBUG;
    expect(createDebugLogger()).toBeNull();
  });

  it("returns null when DTCALC_DEBUG is 'false'", () => {
    process.env.DTCALC_DEBUG = "false";
    expect(createDebugLogger()).toBeNull();
  });

  it("returns DebugLogger when DTCALC_DEBUG is 'true'", () => {
    process.env.DTCALC_DEBUG = "true";
    expect(createDebugLogger()).toBeInstanceOf(DebugLogger);
  });
});

describe("DebugLogger", () => {
  let logDir: string;
  let logger: DebugLogger;

  beforeEach(async () => {
    logDir = await mkdtemp(join(tmpdir(), "dtcalc-debug-test-"));
    logger = new DebugLogger({ logDir });
  });

  afterEach(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  it("creates a session file on first write", async () => {
    expect(logger.getSessionLogPath()).toBeNull();
    logger.logTool({ tool: "dtcalc__formats", params: {}, durationMs: 1, ok: true });
    await logger.flush();
    expect(logger.getSessionLogPath()).toMatch(/session-.*\.jsonl$/);
  });

  it("writes lines in call order", async () => {
    logger.logTool({ tool: "first", params: {}, durationMs: 1, ok: true });
    logger.logTool({ tool: "second", params: {}, durationMs: 2, ok: false, error: "boom" });
    const events = await readEvents(logger);
    expect(events.map((e) => e.tool)).toEqual(["first", "second"]);
    expect(events[1]).toMatchObject({ cat: "tool", ok: false, error: "boom" });
  });

  it("logs evaluations run through runEvaluation", async () => {
    runEvaluation("2024-01-01 + 1d", { logger, source: "cli" });
    runEvaluation("today", { logger, source: "repl" });
    const events = await readEvents(logger);
    expect(events).toHaveLength(2);
    expect(events[0]).toMatchObject({
      cat: "eval",
      expression: "2024-01-01 + 1d",
      source: "cli",
      ok: true,
      result: "2024-01-02",
    });
    expect(events[1]).toMatchObject({
      cat: "eval",
      source: "repl",
      ok: false,
      errorKind: "UnrecognizedOperator",
    });
  });
});

describe("withLogging", () => {
  let logDir: string;

  beforeEach(async () => {
    logDir = await mkdtemp(join(tmpdir(), "dtcalc-with-logging-test-"));
  });

  afterEach(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  it("calls the handler directly without a logger", async () => {
    await expect(withLogging(null, "t", {}, async () => 42)).resolves.toBe(42);
  });

  it("records success and failure", async () => {
    const logger = new DebugLogger({ logDir });
    await withLogging(logger, "ok_tool", { expression: "x" }, async () => "done");
    await expect(
      withLogging(logger, "bad_tool", {}, async () => {
        throw new Error("failed");
      }),
    ).rejects.toThrow("failed");

    const events = await readEvents(logger);
    expect(events[0]).toMatchObject({ tool: "ok_tool", params: { expression: "x" }, ok: true });
    expect(events[1]).toMatchObject({ tool: "bad_tool", ok: false, error: "failed" });
  });

  it("records a returned tool error as a failure", async () => {
    const logger = new DebugLogger({ logDir });
    const result = await withLogging(logger, "err_tool", {}, async () => toolError("bad input"));
    expect(result.isError).toBe(true);

    const events = await readEvents(logger);
    expect(events).toHaveLength(1);
    expect(events[0]).toMatchObject({ cat: "tool", tool: "err_tool", ok: false });
  });
});
