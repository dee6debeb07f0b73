/**
 * In-memory todo store
 */

import type { SortSpec, Todo, TodoFilter, TodoStore } from "../types.js";
import { parseTodoId } from "../id.js";
import { evaluateQuery } from "../query.js";

/**
 * Store holding todos in memory, in insertion order
 *
 * Records are copied on the way in and on the way out, so callers never share
 * mutable state with the store.
 *
 * @example
 * ```typescript
 * const store = new MemoryTodoStore([
 *   { id: "64b7f0c2a1d3e4f5a6b7c8d9", owner: "Ada", status: false, body: "Write tests", category: "work" },
 * ]);
 * const queries = new TodoQueries(store);
 * ```
 */
export class MemoryTodoStore implements TodoStore {
  #todos: Todo[] = [];

  constructor(todos: Iterable<Todo> = []) {
    const seen = new Set<string>();
    for (const todo of todos) {
      const id = parseTodoId(todo.id);
      if (seen.has(id)) {
        throw new Error(`Duplicate todo id: ${id}`);
      }
      seen.add(id);
      this.#todos.push({ ...todo, id });
    }
  }

  async get(id: string): Promise<Todo | null> {
    const key = parseTodoId(id);
    const todo = this.#todos.find((t) => t.id === key);
    return todo ? { ...todo } : null;
  }

  async find(filter: TodoFilter, sort?: SortSpec): Promise<Todo[]> {
    return evaluateQuery(this.#todos, { filter, sort }).map((t) => ({ ...t }));
  }

  async close(): Promise<void> {
    this.#todos = [];
  }
}
