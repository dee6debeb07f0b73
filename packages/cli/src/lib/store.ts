/**
 * Store adapter for CLI
 * Opens a store per command and closes it when the command finishes
 */

import { TodoQueries, openTodoStore, type TodoStore } from "@todoquery/sdk";

export type StoreOpener = (root: string) => TodoStore;

export const openFileStore: StoreOpener = (root) => openTodoStore({ root });

/**
 * Run a command against the queries service for a data directory
 */
export async function withQueries<T>(
  root: string,
  openStore: StoreOpener,
  fn: (queries: TodoQueries) => Promise<T>
): Promise<T> {
  const queries = new TodoQueries(openStore(root));
  try {
    return await fn(queries);
  } finally {
    await queries.close();
  }
}
