/**
 * Todo query service: the four read operations over an injected store
 */

import type {
  CategoryGroup,
  OwnerGroup,
  QueryParams,
  Todo,
  TodoStore,
} from "./types.js";
import { TodoNotFoundError } from "./errors.js";
import { parseTodoId } from "./id.js";
import { buildTodoQuery } from "./query-builder.js";
import { groupByCategory, groupByOwner } from "./aggregate.js";

/**
 * Read-only queries over a todo store
 *
 * Parameters are validated before the store is touched; store failures
 * propagate unchanged.
 *
 * @example
 * ```typescript
 * const queries = new TodoQueries(openTodoStore({ root: "./data" }));
 *
 * const todo = await queries.getTodo("64b7f0c2a1d3e4f5a6b7c8d9");
 * const games = await queries.listTodos({ body: "games", sortby: "owner", sortorder: "desc" });
 * const byOwner = await queries.todosByOwner({ sortBy: "count" });
 * ```
 */
export class TodoQueries {
  #store: TodoStore;

  constructor(store: TodoStore) {
    this.#store = store;
  }

  get store(): TodoStore {
    return this.#store;
  }

  /**
   * Look up a single todo
   * @throws {InvalidTodoIdError} If id is not a well-formed identifier
   * @throws {TodoNotFoundError} If no todo has this id
   */
  async getTodo(id: string): Promise<Todo> {
    const normalized = parseTodoId(id);
    const todo = await this.#store.get(normalized);
    if (!todo) {
      throw new TodoNotFoundError(normalized);
    }
    return todo;
  }

  /**
   * List todos matching owner/category/status/body filters, sorted by
   * `sortby` (default category) in `sortorder` (default asc)
   * @throws {InvalidParameterError} If status is not "complete" or "incomplete"
   */
  async listTodos(params: QueryParams = {}): Promise<Todo[]> {
    const { filter, sort } = buildTodoQuery(params);
    return this.#store.find(filter, sort);
  }

  /**
   * Summarize todos by owner
   */
  async todosByOwner(params: QueryParams = {}): Promise<OwnerGroup[]> {
    return groupByOwner(this.#store, params);
  }

  /**
   * Summarize todos by category
   */
  async todosByCategory(params: QueryParams = {}): Promise<CategoryGroup[]> {
    return groupByCategory(this.#store, params);
  }

  async close(): Promise<void> {
    await this.#store.close();
  }
}
