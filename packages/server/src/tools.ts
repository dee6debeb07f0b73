/**
 * MCP tool implementations for Todo Query
 * Every tool returns two text content items: a one-line summary and the JSON payload
 */

import type { CallToolResult, Tool } from "@modelcontextprotocol/sdk/types.js";
import {
  GetTodoInputSchema,
  ListTodosInputSchema,
  GroupInputSchema,
  type GetTodoOutput,
  type ListTodosOutput,
  type OwnerGroupsOutput,
  type CategoryGroupsOutput,
} from "./schemas.js";
import { getTodoQueries } from "./service/todos.js";
import { errorCodeOf, logger } from "./observability/logger.js";
import { recordToolExecution } from "./observability/metrics.js";

export const GET_TIMEOUT_MS = 2000;
export const QUERY_TIMEOUT_MS = 5000;

export class ToolTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(
    public readonly tool: string,
    public readonly timeoutMs: number
  ) {
    super(`Tool execution timeout after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

// Helper to wrap tool execution with timeout, logging, and metrics
export async function executeTool<T>(
  toolName: string,
  timeoutMs: number,
  handler: () => Promise<T>
): Promise<T> {
  const startTime = Date.now();
  let success = false;
  let error: Error | undefined;
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  try {
    const timeoutPromise = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => reject(new ToolTimeoutError(toolName, timeoutMs)), timeoutMs);
    });

    // Race between handler and timeout
    const result = await Promise.race([handler(), timeoutPromise]);
    success = true;
    return result;
  } catch (err) {
    error = err instanceof Error ? err : new Error(String(err));
    throw error;
  } finally {
    if (timeoutId !== undefined) {
      clearTimeout(timeoutId);
    }
    const duration = Date.now() - startTime;
    logger.toolCall(toolName, duration, success, error);
    recordToolExecution(toolName, duration, success, errorCodeOf(error));
  }
}

function toolResult(summary: string, payload: object): CallToolResult {
  return {
    content: [
      { type: "text", text: summary },
      { type: "text", text: JSON.stringify(payload) },
    ],
  };
}

function plural(count: number, noun: string, nouns = `${noun}s`): string {
  return `${count} ${count === 1 ? noun : nouns}`;
}

/**
 * get_todo: Retrieve a todo by id
 */
export async function getTodo(args: unknown): Promise<CallToolResult> {
  const { id } = GetTodoInputSchema.parse(args);

  return executeTool("get_todo", GET_TIMEOUT_MS, async () => {
    const todo = await getTodoQueries().getTodo(id);
    const payload: GetTodoOutput = { todo };
    return toolResult(`Found todo ${todo.id}`, payload);
  });
}

/**
 * list_todos: Filter and sort todos
 */
export async function listTodos(args: unknown): Promise<CallToolResult> {
  const params = ListTodosInputSchema.parse(args ?? {});

  return executeTool("list_todos", QUERY_TIMEOUT_MS, async () => {
    const todos = await getTodoQueries().listTodos(params);
    const payload: ListTodosOutput = { todos, count: todos.length };
    return toolResult(`Found ${plural(todos.length, "matching todo")}`, payload);
  });
}

/**
 * todos_by_owner: Summarize todos per owner
 */
export async function todosByOwner(args: unknown): Promise<CallToolResult> {
  const params = GroupInputSchema.parse(args ?? {});

  return executeTool("todos_by_owner", QUERY_TIMEOUT_MS, async () => {
    const groups = await getTodoQueries().todosByOwner(params);
    const payload: OwnerGroupsOutput = { groups, count: groups.length };
    return toolResult(`Found ${plural(groups.length, "owner")}`, payload);
  });
}

/**
 * todos_by_category: Summarize todos per category
 */
export async function todosByCategory(args: unknown): Promise<CallToolResult> {
  const params = GroupInputSchema.parse(args ?? {});

  return executeTool("todos_by_category", QUERY_TIMEOUT_MS, async () => {
    const groups = await getTodoQueries().todosByCategory(params);
    const payload: CategoryGroupsOutput = { groups, count: groups.length };
    return toolResult(`Found ${plural(groups.length, "category", "categories")}`, payload);
  });
}

const groupSortProperties = (field: string) => ({
  sortBy: {
    type: "string",
    description: `"count" to sort by group size; "${field}" (default) to sort by ${field}`,
  },
  sortOrder: {
    type: "string",
    description: '"desc" for descending; anything else sorts ascending',
  },
});

/**
 * Tool definitions for MCP server
 */
export const toolDefinitions: Tool[] = [
  {
    name: "get_todo",
    description: "Retrieve a todo by its 24-character hexadecimal id",
    inputSchema: {
      type: "object",
      properties: {
        id: {
          type: "string",
          description: "Todo id",
        },
      },
      required: ["id"],
    },
  },
  {
    name: "list_todos",
    description:
      "List todos filtered by owner, category, status and body text, sorted by a field (default: category ascending)",
    inputSchema: {
      type: "object",
      properties: {
        owner: {
          type: "string",
          description: "Owner name (whole value, case-insensitive)",
        },
        category: {
          type: "string",
          description: "Category name (whole value, case-insensitive)",
        },
        status: {
          type: "string",
          enum: ["complete", "incomplete"],
          description: "Completion status",
        },
        body: {
          type: "string",
          description: "Text the body contains (case-insensitive)",
        },
        contains: {
          type: "string",
          description: "Alias for body",
        },
        sortby: {
          type: "string",
          enum: ["id", "_id", "owner", "status", "body", "category"],
          description: "Field to sort by",
        },
        sortorder: {
          type: "string",
          description: '"desc" for descending; anything else sorts ascending',
        },
      },
    },
  },
  {
    name: "todos_by_owner",
    description: "Group every todo by owner with a count and the id and category of each member",
    inputSchema: {
      type: "object",
      properties: groupSortProperties("owner"),
    },
  },
  {
    name: "todos_by_category",
    description: "Group every todo by category with a count and the id and owner of each member",
    inputSchema: {
      type: "object",
      properties: groupSortProperties("category"),
    },
  },
];

export type ToolName = "get_todo" | "list_todos" | "todos_by_owner" | "todos_by_category";

/**
 * Tool handlers map
 */
export const toolHandlers: Record<ToolName, (args: unknown) => Promise<CallToolResult>> = {
  get_todo: getTodo,
  list_todos: listTodos,
  todos_by_owner: todosByOwner,
  todos_by_category: todosByCategory,
};

export function isToolName(name: string): name is ToolName {
  return Object.hasOwn(toolHandlers, name);
}
