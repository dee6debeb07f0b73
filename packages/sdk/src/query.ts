/**
 * Query evaluation for stores that filter and sort in-process
 */

import type { FieldCondition, FilterField, SortSpec, Todo, TodoFilter } from "./types.js";

const FILTER_FIELDS: readonly FilterField[] = ["owner", "category", "status", "body"];

type FieldValue = string | boolean;

/**
 * Evaluate a field-level condition
 * @param value - Actual field value
 * @param cond - `$eq` literal or `$regex` pattern
 * @returns true if condition matches
 */
function matchField(value: FieldValue, cond: FieldCondition<string> | FieldCondition<boolean>): boolean {
  if ("$regex" in cond) {
    // search() ignores lastIndex, so a global pattern behaves like any other
    return typeof value === "string" && value.search(cond.$regex) !== -1;
  }
  return value === cond.$eq;
}

/**
 * Test if a todo satisfies every condition of a filter
 * @param todo - Todo to test
 * @param filter - Conjunction of field conditions
 * @returns true if todo matches filter
 */
export function matches(todo: Todo, filter: TodoFilter): boolean {
  for (const field of FILTER_FIELDS) {
    const cond = filter[field];
    if (cond !== undefined && !matchField(todo[field], cond)) {
      return false;
    }
  }
  return true;
}

/**
 * Compare strings by Unicode code point rather than UTF-16 code unit,
 * so astral characters order after the rest of the BMP
 */
function compareCodePoints(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length) {
    const ca = a.codePointAt(i) ?? 0;
    const cb = b.codePointAt(i) ?? 0;
    if (ca !== cb) {
      return ca < cb ? -1 : 1;
    }
    // Equal code points span the same number of units in both strings
    i += ca > 0xffff ? 2 : 1;
  }
  return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

/**
 * Compare two field values for sorting
 * Booleans order false before true; strings compare by code point.
 * @returns negative, 0, or positive
 */
export function compareValues(a: FieldValue, b: FieldValue): number {
  if (typeof a === "boolean" && typeof b === "boolean") {
    return a === b ? 0 : a ? 1 : -1;
  }
  if (typeof a === "string" && typeof b === "string") {
    return compareCodePoints(a, b);
  }
  // Mixed types: boolean before string
  return typeof a === "boolean" ? -1 : 1;
}

/**
 * Sort todos according to a sort specification; equal keys are ordered by id
 * @param todos - Todos to sort (mutates array)
 * @param sort - Sort specification
 */
export function sortTodos(todos: Todo[], sort: SortSpec): void {
  const sign = sort.direction === "desc" ? -1 : 1;

  todos.sort((a, b) => {
    const cmp = compareValues(a[sort.field], b[sort.field]);
    if (cmp !== 0) {
      return sign * cmp;
    }
    return compareValues(a.id, b.id);
  });
}

/**
 * Evaluate a listing query against an array of todos
 * Pure orchestrator that composes filter → sort
 * @param todos - Todos to evaluate (not mutated)
 * @param spec - Filter and optional sort
 * @returns Matching todos in the requested order
 */
export function evaluateQuery(todos: readonly Todo[], spec: { filter: TodoFilter; sort?: SortSpec }): Todo[] {
  const filtered = todos.filter((t) => matches(t, spec.filter));

  if (spec.sort) {
    sortTodos(filtered, spec.sort);
  }

  return filtered;
}
