/**
 * Server construction, separate from the stdio entry point so tests can
 * connect it to an in-memory transport.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { DebugLogger } from "./lib/debug-logger.js";
import type { TimeSource } from "./lib/evaluator.js";
import { registerCalcTools } from "./tools/calc-tools.js";

export const SERVER_VERSION = "1.0.0";

export interface ServerOptions {
  logger?: DebugLogger | null;
  now?: TimeSource;
}

export function createServer(options: ServerOptions = {}): McpServer {
  const server = new McpServer({
    name: "dtcalc",
    version: SERVER_VERSION,
  });

  registerCalcTools(server, {
    logger: options.logger ?? null,
    now: options.now,
  });

  return server;
}
