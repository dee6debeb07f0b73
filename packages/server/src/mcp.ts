/**
 * MCP server wiring: tool listing and tool calls
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ErrorCode,
  McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { toolDefinitions, toolHandlers, isToolName } from "./tools.js";
import { mapErrorToMcp } from "./errors.js";
import { errorCodeOf, logger } from "./observability/logger.js";

export const SERVER_NAME = "todoquery-server";
export const SERVER_VERSION = "0.1.0";

export function createServer(): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: toolDefinitions }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;

    try {
      if (!isToolName(name)) {
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
      return await toolHandlers[name](args);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error("server.tool.error", {
        tool: name,
        err_code: errorCodeOf(err),
        err_message: err.message,
        stack: err.stack,
      });

      throw mapErrorToMcp(error);
    }
  });

  return server;
}
