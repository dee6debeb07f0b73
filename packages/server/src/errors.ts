/**
 * Mapping of tool failures onto MCP error codes
 */

import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { InvalidParameterError, InvalidTodoIdError, TodoNotFoundError } from "@todoquery/sdk";
import { ToolTimeoutError } from "./tools.js";

export function mapErrorToMcp(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof z.ZodError) {
    return new McpError(
      ErrorCode.InvalidParams,
      `Validation error: ${error.issues.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ")}`
    );
  }

  if (error instanceof InvalidTodoIdError || error instanceof InvalidParameterError) {
    return new McpError(ErrorCode.InvalidParams, error.message, { code: error.code });
  }

  if (error instanceof TodoNotFoundError) {
    return new McpError(ErrorCode.InvalidRequest, error.message, { code: error.code, id: error.id });
  }

  if (error instanceof ToolTimeoutError) {
    return new McpError(ErrorCode.RequestTimeout, error.message);
  }

  if (error instanceof Error) {
    return new McpError(ErrorCode.InternalError, error.message);
  }

  return new McpError(ErrorCode.InternalError, String(error));
}
