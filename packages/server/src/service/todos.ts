/**
 * Todo query service for the MCP tools
 * Opens the file-backed store under DATA_ROOT on first use
 */

import { homedir } from "node:os";
import { join } from "node:path";
import { TodoQueries, openTodoStore } from "@todoquery/sdk";
import { logger } from "../observability/logger.js";

const DEFAULT_DATA_ROOT = "./data";

/**
 * Data directory from DATA_ROOT, with a leading `~` expanded
 */
export function resolveDataRoot(env: NodeJS.ProcessEnv = process.env): string {
  const root = env.DATA_ROOT || DEFAULT_DATA_ROOT;
  if (root === "~") {
    return homedir();
  }
  if (root.startsWith("~/")) {
    return join(homedir(), root.slice(2));
  }
  return root;
}

let todoQueries: TodoQueries | undefined;

export function getTodoQueries(): TodoQueries {
  if (!todoQueries) {
    const dataRoot = resolveDataRoot();
    todoQueries = new TodoQueries(openTodoStore({ root: dataRoot }));
    logger.info("service.init", { data_root: dataRoot });
  }
  return todoQueries;
}

/**
 * Replace the service instance; `undefined` reopens from DATA_ROOT on next use
 */
export function setTodoQueries(queries: TodoQueries | undefined): void {
  todoQueries = queries;
}
