#!/usr/bin/env node
/**
 * dtcalc MCP Server - Entry Point
 *
 * Creates an MCP server that provides date and duration arithmetic tools.
 * Connects via stdio transport.
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createDebugLogger } from "./lib/debug-logger.js";
import { createServer } from "./server.js";

/**
 * Main entry point. Creates the MCP server, registers tools,
 * and connects via stdio transport.
 */
async function main(): Promise<void> {
  console.error("[dtcalc] Starting MCP server...");

  const logger = createDebugLogger();
  if (logger) {
    console.error("[dtcalc] Debug logging enabled (DTCALC_DEBUG=true)");
  }

  const server = createServer({ logger });

  const transport = new StdioServerTransport();
  await server.connect(transport);

  console.error("[dtcalc] MCP server connected and ready.");
}

// Run
main().catch((error) => {
  console.error("[dtcalc] Fatal error:", error);
  process.exit(1);
});
