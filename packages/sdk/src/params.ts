/**
 * Request parameter parsing
 *
 * Turns an open string-keyed parameter map into validated option structs.
 * Enumerated values are checked here, before any store access.
 */

import type {
  GroupField,
  GroupQueryOptions,
  QueryParams,
  SortDirection,
  SortField,
  TodoQueryOptions,
} from "./types.js";
import { InvalidParameterError } from "./errors.js";
import { logDebug } from "./observability/logs.js";

/**
 * Legal values of the `status` parameter, mapped to the stored boolean
 */
const STATUS_VALUES = new Map<string, boolean>([
  ["complete", true],
  ["incomplete", false],
]);

export const STATUS_PARAM_MESSAGE = "The status filter must be either 'complete' or 'incomplete'";

/**
 * Field names accepted by `sortby`
 */
const SORT_FIELDS = new Map<string, SortField>([
  ["id", "id"],
  ["_id", "id"],
  ["owner", "owner"],
  ["status", "status"],
  ["body", "body"],
  ["category", "category"],
]);

/**
 * Read a single parameter value; repeated parameters contribute their first value.
 * A key present with no values reads as the empty string, so it stays a predicate.
 */
export function readParam(params: QueryParams, name: string): string | undefined {
  const value = params[name];
  if (value === undefined || typeof value === "string") {
    return value;
  }
  return value[0] ?? "";
}

/**
 * Parse a `status` value into the stored boolean
 * @throws InvalidParameterError for anything but "complete" or "incomplete"
 */
export function parseStatus(value: string): boolean {
  const status = STATUS_VALUES.get(value);
  if (status === undefined) {
    throw new InvalidParameterError("status", [...STATUS_VALUES.keys()], STATUS_PARAM_MESSAGE);
  }
  return status;
}

/**
 * Anything other than the exact string "desc" sorts ascending
 */
export function parseSortDirection(value: string | undefined): SortDirection {
  return value === "desc" ? "desc" : "asc";
}

/**
 * Parse listing parameters: owner, category, status, body (alias contains),
 * sortby, sortorder. Unrecognized parameter names are ignored.
 */
export function parseTodoQueryParams(params: QueryParams): TodoQueryOptions {
  const options: TodoQueryOptions = {};

  const owner = readParam(params, "owner");
  if (owner !== undefined) {
    options.owner = owner;
  }

  const category = readParam(params, "category");
  if (category !== undefined) {
    options.category = category;
  }

  const status = readParam(params, "status");
  if (status !== undefined) {
    options.status = parseStatus(status);
  }

  const body = readParam(params, "body") ?? readParam(params, "contains");
  if (body !== undefined) {
    options.body = body;
  }

  const sortBy = readParam(params, "sortby");
  if (sortBy !== undefined) {
    const field = SORT_FIELDS.get(sortBy);
    if (field) {
      options.sortBy = field;
    } else {
      logDebug("params.sortby.fallback", { parameter: "sortby", value: sortBy, message: "unknown sort field" });
    }
  }

  const sortOrder = readParam(params, "sortorder");
  if (sortOrder !== undefined) {
    options.sortOrder = parseSortDirection(sortOrder);
  }

  return options;
}

/**
 * Parse grouping parameters: sortBy and sortOrder.
 *
 * `sortBy` absent, "_id", "value" or equal to the group field name means
 * sort by group identity; "count" sorts by group size. Any other value falls
 * back to group identity.
 */
export function parseGroupQueryParams(params: QueryParams, field: GroupField): GroupQueryOptions {
  const sortBy = readParam(params, "sortBy");
  const sortOrder = parseSortDirection(readParam(params, "sortOrder"));

  if (sortBy === "count") {
    return { sortBy: "count", sortOrder };
  }

  if (sortBy !== undefined && sortBy !== "_id" && sortBy !== "value" && sortBy !== field) {
    logDebug("params.sortBy.fallback", {
      parameter: "sortBy",
      value: sortBy,
      message: `unknown sort field for ${field} groups`,
    });
  }

  return { sortBy: "value", sortOrder };
}
