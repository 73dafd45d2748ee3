import { describe, it, expect } from "vitest";
import { PassThrough, Writable } from "node:stream";
import { runOnce, runRepl, USAGE } from "../lib/shell.js";

const fixedNow = () => new Date(2026, 1, 15, 14, 30, 5);

function collector(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

// ---------------------------------------------------------------------------
// runOnce
// ---------------------------------------------------------------------------

describe("runOnce", () => {
  it("prints the result with a newline and exits 0", () => {
    const stdout = collector();
    const stderr = collector();
    const code = runOnce(
      "today + 3d",
      { stdout: stdout.stream, stderr: stderr.stream },
      { now: fixedNow },
    );
    expect(code).toBe(0);
    expect(stdout.text()).toBe("2026-02-18\n");
    expect(stderr.text()).toBe("");
  });

  it("prints the error to stderr and exits 1", () => {
    const stdout = collector();
    const stderr = collector();
    const code = runOnce(
      "2024-01-01 + 5 fortnights",
      { stdout: stdout.stream, stderr: stderr.stream },
      { now: fixedNow },
    );
    expect(code).toBe(1);
    expect(stdout.text()).toBe("");
    expect(stderr.text()).toBe(
      'Error: Could not parse right operand "5 fortnights": unsupported duration unit "fortnights" in "5 fortnights"\n',
    );
  });

  it("keeps the diagnostic on one line for multi-line input", () => {
    const stdout = collector();
    const stderr = collector();
    const code = runOnce(
      "2024-01-01 + 5\nfortnights",
      { stdout: stdout.stream, stderr: stderr.stream },
      { now: fixedNow },
    );
    expect(code).toBe(1);
    expect(stderr.text()).toBe(
      'Error: Could not parse right operand "5 fortnights": unsupported duration unit "fortnights" in "5 fortnights"\n',
    );
  });
});

// ---------------------------------------------------------------------------
// runRepl
// ---------------------------------------------------------------------------

describe("runRepl", () => {
  async function session(lines: string[], history: string[] = []): Promise<string> {
    const input = new PassThrough();
    const output = collector();
    input.end(lines.map((l) => l + "\n").join(""));
    await runRepl(
      { input, output: output.stream },
      { color: false, historySize: 100 },
      history,
      { now: fixedNow },
    );
    return output.text();
  }

  it("prints results and errors and says goodbye at EOF", async () => {
    const out = await session(["2024-01-01 + 1d", "bogus"]);
    expect(out).toBe(
      "> = 2024-01-02\n" +
        '> ! Error: Expected "<operand> + <operand>" or "<operand> - <operand>", got "bogus"\n' +
        "> \nBye!\n",
    );
  });

  it("prints usage for help and skips blank lines", async () => {
    const out = await session(["", "help"]);
    expect(out).toBe("> > " + USAGE + "\n> \nBye!\n");
  });

  it("stops at exit", async () => {
    const out = await session(["exit", "today + 1d"]);
    expect(out).toBe("> \nBye!\n");
  });

  it("records entered lines in the history", async () => {
    const history = ["now + 1h"];
    await session(["today + 1d", "", "today + 1d", "quit"], history);
    expect(history).toEqual(["now + 1h", "today + 1d", "quit"]);
  });

  it("colors the prompt and markers when enabled", async () => {
    const input = new PassThrough();
    const output = collector();
    input.end("1d + 1d\n");
    await runRepl(
      { input, output: output.stream },
      { color: true, historySize: 10 },
      [],
      { now: fixedNow },
    );
    expect(output.text()).toContain("\x1b[94m= \x1b[0m2 days\n");
  });
});
