/**
 * Todo identifiers: 12 random bytes rendered as 24 lowercase hex characters
 */

import { randomBytes } from "node:crypto";
import { InvalidTodoIdError } from "./errors.js";

const TODO_ID_PATTERN = /^[0-9a-f]{24}$/i;

/**
 * Check whether a string is a well-formed todo identifier (either letter case)
 */
export function isTodoId(value: string): boolean {
  return TODO_ID_PATTERN.test(value);
}

/**
 * Normalize an identifier to its canonical lowercase form
 * @throws InvalidTodoIdError if the value is not a well-formed identifier
 */
export function parseTodoId(value: string): string {
  if (!isTodoId(value)) {
    throw new InvalidTodoIdError(value);
  }
  return value.toLowerCase();
}

/**
 * Generate a fresh random identifier
 */
export function generateTodoId(): string {
  return randomBytes(12).toString("hex");
}
