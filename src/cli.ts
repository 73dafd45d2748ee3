#!/usr/bin/env node
/**
 * dtcalc command line.
 *
 *   dtcalc "today + 3d"          argument mode
 *   echo "today + 3d" | dtcalc   piped mode
 *   dtcalc                       interactive prompt with history
 */

import { text } from "node:stream/consumers";
import { createDebugLogger } from "./lib/debug-logger.js";
import { expandHome, loadConfigOrDefaults } from "./lib/config.js";
import { loadHistory, saveHistory } from "./lib/history.js";
import { runOnce, runRepl, USAGE } from "./lib/shell.js";

async function main(argv: string[]): Promise<number> {
  if (argv[0] === "--help" || argv[0] === "-h") {
    console.log(USAGE);
    return 0;
  }

  const logger = createDebugLogger();

  let expression: string | undefined;
  if (argv.length > 0) {
    expression = argv.join(" ").trim();
  } else if (!process.stdin.isTTY) {
    expression = (await text(process.stdin)).trim();
  }

  if (expression !== undefined) {
    const code = expression
      ? runOnce(expression, { stdout: process.stdout, stderr: process.stderr }, { logger })
      : 0;
    await logger?.flush();
    return code;
  }

  const config = await loadConfigOrDefaults();
  const historyFile = expandHome(config.historyFile);
  const history = await loadHistory(historyFile);

  await runRepl(
    { input: process.stdin, output: process.stdout, terminal: true },
    config,
    history,
    { logger },
  );

  await saveHistory(historyFile, history, config.historySize);
  await logger?.flush();
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error("[dtcalc] Fatal error:", error);
    process.exit(1);
  });
