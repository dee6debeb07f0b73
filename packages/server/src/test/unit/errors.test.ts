/**
 * Unit tests for MCP error mapping
 */

import { describe, it, expect } from "vitest";
import { z } from "zod";
import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import {
  DocumentReadError,
  InvalidParameterError,
  InvalidTodoIdError,
  TodoNotFoundError,
  STATUS_PARAM_MESSAGE,
} from "@todoquery/sdk";
import { mapErrorToMcp } from "../../errors.js";
import { ToolTimeoutError } from "../../tools.js";
import { GetTodoInputSchema } from "../../schemas.js";

describe("mapErrorToMcp", () => {
  it("should map validation failures to InvalidParams", () => {
    const zodError = GetTodoInputSchema.safeParse({ id: 1 }).error;
    expect(zodError).toBeInstanceOf(z.ZodError);
    const mapped = mapErrorToMcp(zodError);
    expect(mapped.code).toBe(ErrorCode.InvalidParams);
    expect(mapped.message).toContain("Validation error: id:");
  });

  it("should map malformed ids to InvalidParams", () => {
    const mapped = mapErrorToMcp(new InvalidTodoIdError("bad"));
    expect(mapped.code).toBe(ErrorCode.InvalidParams);
    expect(mapped.message).toContain("The requested todo id wasn't a legal identifier");
    expect(mapped.data).toEqual({ code: "E_BAD_ID" });
  });

  it("should map invalid parameters to InvalidParams", () => {
    const mapped = mapErrorToMcp(
      new InvalidParameterError("status", ["complete", "incomplete"], STATUS_PARAM_MESSAGE)
    );
    expect(mapped.code).toBe(ErrorCode.InvalidParams);
    expect(mapped.message).toContain(STATUS_PARAM_MESSAGE);
  });

  it("should map missing todos to InvalidRequest", () => {
    const mapped = mapErrorToMcp(new TodoNotFoundError("64b7f0c2a1d3e4f5a6b7c8d9"));
    expect(mapped.code).toBe(ErrorCode.InvalidRequest);
    expect(mapped.data).toEqual({ code: "ENOENT", id: "64b7f0c2a1d3e4f5a6b7c8d9" });
  });

  it("should map timeouts to RequestTimeout", () => {
    expect(mapErrorToMcp(new ToolTimeoutError("get_todo", 2000)).code).toBe(ErrorCode.RequestTimeout);
  });

  it("should map store and unknown failures to InternalError", () => {
    expect(mapErrorToMcp(new DocumentReadError("/data/todos/x.json")).code).toBe(ErrorCode.InternalError);
    expect(mapErrorToMcp(new Error("boom")).code).toBe(ErrorCode.InternalError);
    expect(mapErrorToMcp("boom").code).toBe(ErrorCode.InternalError);
  });

  it("should pass MCP errors through", () => {
    const original = new McpError(ErrorCode.MethodNotFound, "Unknown tool: nope");
    expect(mapErrorToMcp(original)).toBe(original);
  });
});
