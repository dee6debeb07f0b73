#!/usr/bin/env node

/**
 * MCP server for Todo Query
 * Exposes todo lookup, listing and grouping over stdio transport
 *
 * Protocol: Model Context Protocol (MCP) over stdio
 * All logging goes to stderr; stdout is reserved for protocol frames
 */

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createServer } from "./mcp.js";
import { resolveDataRoot, getTodoQueries } from "./service/todos.js";
import { logger } from "./observability/logger.js";
import { metrics } from "./observability/metrics.js";

async function main(): Promise<void> {
  // Stray console.log/info/debug output would corrupt the protocol stream
  const redirectToStderr =
    (method: string) =>
    (...args: unknown[]) => {
      console.error(`[WARN] Attempted ${method} (redirected to stderr):`, ...args);
    };
  console.log = redirectToStderr("console.log");
  console.info = redirectToStderr("console.info");
  console.debug = redirectToStderr("console.debug");

  const enabled = process.env.MCP_TODOQUERY_ENABLED !== "false"; // Default: enabled
  if (!enabled) {
    console.error("MCP Todo Query server is disabled (MCP_TODOQUERY_ENABLED=false)");
    process.exit(0);
  }

  const server = createServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info("server.start", { data_root: resolveDataRoot() });

  const shutdown = async (): Promise<void> => {
    logger.info("server.shutdown", { metrics: metrics.snapshot() });
    await getTodoQueries().close();
    await transport.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("server.shutdown.error", {
        error: error instanceof Error ? error.message : String(error),
      });
      process.exit(1);
    });
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  logger.error("server.fatal", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
