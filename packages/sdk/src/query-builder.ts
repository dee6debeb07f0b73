/**
 * Query builder: validated listing options → filter and sort specification
 */

import type { QueryParams, SortSpec, TodoFilter, TodoQuery, TodoQueryOptions } from "./types.js";
import { literalMatch } from "./literal.js";
import { parseTodoQueryParams } from "./params.js";

/**
 * Sort field used when `sortby` is absent or unrecognized
 */
export const DEFAULT_SORT_FIELD = "category";

/**
 * Build the conjunction of the predicates present in `options`
 *
 * - owner, category: literal case-insensitive whole-value match
 * - body: literal case-insensitive substring match
 * - status: boolean equality
 */
export function buildFilter(options: TodoQueryOptions): TodoFilter {
  const filter: TodoFilter = {};

  if (options.owner !== undefined) {
    filter.owner = { $regex: literalMatch(options.owner, "exact") };
  }
  if (options.category !== undefined) {
    filter.category = { $regex: literalMatch(options.category, "exact") };
  }
  if (options.status !== undefined) {
    filter.status = { $eq: options.status };
  }
  if (options.body !== undefined) {
    filter.body = { $regex: literalMatch(options.body, "contains") };
  }

  return filter;
}

/**
 * Build the sort specification, defaulting to ascending by category
 */
export function buildSort(options: TodoQueryOptions): SortSpec {
  return {
    field: options.sortBy ?? DEFAULT_SORT_FIELD,
    direction: options.sortOrder ?? "asc",
  };
}

/**
 * Parse raw request parameters and build the listing query
 * @throws InvalidParameterError if `status` is not "complete" or "incomplete"
 */
export function buildTodoQuery(params: QueryParams): TodoQuery {
  const options = parseTodoQueryParams(params);
  return {
    filter: buildFilter(options),
    sort: buildSort(options),
  };
}
