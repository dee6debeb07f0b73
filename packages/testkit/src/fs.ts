/**
 * File system test utilities
 */

import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openTodoStore } from "@todoquery/sdk";
import type { StoreOptions, Todo, TodoStore } from "@todoquery/sdk";
import { fixtureTodos } from "./fixtures.js";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "todoquery-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempStoreRoot(prefix = "todoquery-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write todos as `<root>/<collection>/<id>.json`, the layout the file store reads
 * @returns Path of the collection directory
 */
export async function writeTodoFiles(
  root: string,
  todos: readonly Todo[],
  collection = "todos"
): Promise<string> {
  const dir = join(root, collection);
  await mkdir(dir, { recursive: true });

  for (const { id, ...fields } of todos) {
    await writeFile(join(dir, `${id}.json`), JSON.stringify(fields, null, 2) + "\n", "utf-8");
  }

  return dir;
}

/**
 * Execute a function with a temporary file store seeded with todos, cleaning up after
 * @param fn - Function to execute with store
 * @param options - Todos to seed (default: the fixture todos) and store options
 * @returns Result of fn
 */
export async function withTempStore<T>(
  fn: (store: TodoStore, root: string) => Promise<T>,
  options?: { todos?: readonly Todo[]; collection?: StoreOptions["collection"] }
): Promise<T> {
  const root = await createTempStoreRoot();
  const collection = options?.collection;
  let store: TodoStore;
  try {
    await writeTodoFiles(root, options?.todos ?? fixtureTodos(), collection);
    store = openTodoStore({ root, collection });
  } catch (err) {
    await removeDir(root);
    throw err;
  }

  try {
    return await fn(store, root);
  } finally {
    await store.close();
    await removeDir(root);
  }
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempStoreRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
