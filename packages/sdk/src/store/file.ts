/**
 * File-backed todo store
 */

import * as path from "node:path";
import type { SortSpec, StoreOptions, Todo, TodoFilter, TodoStore } from "../types.js";
import { InvalidDocumentError } from "../errors.js";
import { parseTodoId } from "../id.js";
import { listFiles, readDocument } from "../io.js";
import { evaluateQuery } from "../query.js";
import { checkTodoDocument } from "../schema.js";
import { logDebug } from "../observability/logs.js";

const DEFAULT_COLLECTION = "todos";

/**
 * File names that hold a todo: canonical identifier plus .json
 */
const TODO_FILE_PATTERN = /^[0-9a-f]{24}\.json$/;

const COLLECTION_PATTERN = /^[A-Za-z0-9_-][A-Za-z0-9_.-]*$/;

/**
 * Todo store reading one JSON document per todo from `<root>/<collection>/<id>.json`
 *
 * The store is read-only: documents are created and removed by whatever owns
 * the data directory. Every read goes to disk, so changes made between calls
 * are visible to the next call.
 *
 * @example
 * ```typescript
 * const store = openTodoStore({ root: "./data" });
 * const queries = new TodoQueries(store);
 * const open = await queries.listTodos({ status: "incomplete", sortby: "owner" });
 * ```
 */
export class FileTodoStore implements TodoStore {
  #root: string;
  #collection: string;
  #dir: string;

  constructor(options: StoreOptions) {
    const collection = options.collection ?? DEFAULT_COLLECTION;
    if (!COLLECTION_PATTERN.test(collection)) {
      throw new Error(
        `Invalid collection name "${collection}": only letters, numbers, underscore, dash and dot are allowed`
      );
    }

    this.#root = path.resolve(options.root);
    this.#collection = collection;
    this.#dir = path.join(this.#root, collection);
  }

  get root(): string {
    return this.#root;
  }

  get collection(): string {
    return this.#collection;
  }

  /**
   * Retrieve a todo by identifier
   * @returns Todo if found, null otherwise
   * @throws {InvalidTodoIdError} If id is not a well-formed identifier
   * @throws {DocumentReadError} If the file exists but cannot be read
   * @throws {InvalidDocumentError} If the file is not a valid todo document
   */
  async get(id: string): Promise<Todo | null> {
    return this.#read(parseTodoId(id));
  }

  /**
   * Find todos matching a filter
   *
   * Scans the whole collection. Without a sort, todos come back in
   * identifier order.
   */
  async find(filter: TodoFilter, sort?: SortSpec): Promise<Todo[]> {
    const todos: Todo[] = [];
    for await (const todo of this.#scan()) {
      todos.push(todo);
    }
    return evaluateQuery(todos, { filter, sort });
  }

  async close(): Promise<void> {
    // Nothing is held open between calls
  }

  /**
   * Read every todo in the collection, in identifier order
   */
  async *#scan(): AsyncIterable<Todo> {
    const files = await listFiles(this.#dir, ".json");

    for (const file of files) {
      if (!TODO_FILE_PATTERN.test(file)) {
        logDebug("store.scan.skip", {
          collection: this.#collection,
          file,
          message: "not a todo file",
        });
        continue;
      }

      // Removed between listing and reading
      const todo = await this.#read(path.basename(file, ".json"));
      if (todo) {
        yield todo;
      }
    }
  }

  async #read(id: string): Promise<Todo | null> {
    const filePath = path.join(this.#dir, `${id}.json`);
    const content = await readDocument(filePath);
    if (content === null) {
      return null;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new InvalidDocumentError(filePath, [`invalid JSON: ${reason}`], { cause: err });
    }

    const check = checkTodoDocument(parsed);
    if (!check.ok) {
      throw new InvalidDocumentError(filePath, check.errors);
    }

    const { doc } = check;
    for (const embedded of [doc.id, doc._id]) {
      if (typeof embedded === "string" && embedded.toLowerCase() !== id) {
        throw new InvalidDocumentError(filePath, [`embedded id "${embedded}" does not match file name`]);
      }
    }

    return {
      id,
      owner: doc.owner,
      status: doc.status,
      body: doc.body,
      category: doc.category,
    };
  }
}

/**
 * Open a file-backed todo store
 * @param options - Root directory and optional collection name
 */
export function openTodoStore(options: StoreOptions): TodoStore {
  return new FileTodoStore(options);
}
