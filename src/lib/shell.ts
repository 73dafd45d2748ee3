/**
 * Command-line shell around the evaluator: one-shot evaluation and the
 * interactive prompt. Streams are injected so both can run in tests.
 */

import { createInterface } from "node:readline";
import type { DtcalcConfig } from "./config-types.js";
import type { DebugLogger } from "./debug-logger.js";
import { describeError } from "./errors.js";
import type { TimeSource } from "./evaluator.js";
import { recordEntry } from "./history.js";
import { runEvaluation } from "./run.js";

const RESET = "\x1b[0m";
const LIGHTBLUE = "\x1b[94m";
const RED = "\x1b[91m";

export const USAGE = [
  "Usage:",
  "  dtcalc                      # Launch interactive mode",
  '  dtcalc "today + 3d"         # Command-line argument mode',
  '  echo "today + 3d" | dtcalc  # Piped input',
  "",
  "Expression format:",
  "  [datetime] [+|-] [duration]",
  "  [duration] [+|-] [duration]",
  "  [datetime] - [datetime]",
  "",
  "Examples:",
  "  today + 5d",
  "  2024-01-01 - 2023-01-01",
  "  now + 3h 15m",
].join("\n");

export interface ShellDeps {
  logger?: DebugLogger | null;
  now?: TimeSource;
}

function paint(color: string, text: string, enabled: boolean): string {
  return enabled ? `${color}${text}${RESET}` : text;
}

// ---------------------------------------------------------------------------
// One-shot
// ---------------------------------------------------------------------------

/**
 * Evaluate one expression, writing the result to `stdout` or the error to
 * `stderr`. Returns the process exit code.
 */
export function runOnce(
  expression: string,
  io: { stdout: NodeJS.WritableStream; stderr: NodeJS.WritableStream },
  deps: ShellDeps = {},
): number {
  const outcome = runEvaluation(expression, {
    logger: deps.logger,
    now: deps.now,
    source: "cli",
  });
  if (!outcome.ok) {
    io.stderr.write(`Error: ${describeError(outcome.error)}\n`);
    return 1;
  }
  io.stdout.write(outcome.value.text + "\n");
  return 0;
}

// ---------------------------------------------------------------------------
// Interactive prompt
// ---------------------------------------------------------------------------

export interface ReplIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  terminal?: boolean;
}

/**
 * Run the prompt until EOF, "exit" or "quit". `history` (oldest first) is
 * offered for recall and extended in place with every entered line.
 */
export async function runRepl(
  io: ReplIO,
  config: Pick<DtcalcConfig, "color" | "historySize">,
  history: string[],
  deps: ShellDeps = {},
): Promise<void> {
  const rl = createInterface({
    input: io.input,
    output: io.output,
    terminal: io.terminal ?? false,
    history: [...history].reverse(),
    historySize: config.historySize,
  });

  const write = (line: string): void => {
    io.output.write(line + "\n");
  };

  // Ctrl-C ends the session like EOF
  rl.on("SIGINT", () => rl.close());

  rl.setPrompt(paint(LIGHTBLUE, "> ", config.color));
  rl.prompt();

  for await (const raw of rl) {
    const line = raw.trim();
    if (line) recordEntry(history, line);

    if (line === "exit" || line === "quit") break;

    if (line === "help") {
      write(USAGE);
    } else if (line) {
      const outcome = runEvaluation(line, {
        logger: deps.logger,
        now: deps.now,
        source: "repl",
      });
      if (outcome.ok) {
        write(`${paint(LIGHTBLUE, "= ", config.color)}${outcome.value.text}`);
      } else {
        write(`${paint(RED, "! ", config.color)}Error: ${describeError(outcome.error)}`);
      }
    }
    rl.prompt();
  }

  // Leaving the loop (EOF or break) closes the interface
  write("\nBye!");
}
