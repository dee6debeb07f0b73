/**
 * Core types for Todo Query
 */

/**
 * A todo record as returned by every query
 */
export interface Todo {
  /** Store-assigned identifier (24 lowercase hex characters) */
  id: string;
  /** Who the todo belongs to */
  owner: string;
  /** true = complete, false = incomplete */
  status: boolean;
  /** Free-text description */
  body: string;
  /** Free-text classification label */
  category: string;
}

/**
 * Fields a todo can be filtered on
 */
export type FilterField = "owner" | "category" | "status" | "body";

/**
 * Fields a todo listing can be sorted on
 */
export type SortField = "id" | "owner" | "status" | "body" | "category";

export type SortDirection = "asc" | "desc";

/**
 * Field-level condition, in the Mango shape stores evaluate
 */
export type FieldCondition<T> = { $eq: T } | { $regex: RegExp };

/**
 * Conjunction of field conditions. An empty filter matches every todo.
 */
export interface TodoFilter {
  owner?: FieldCondition<string>;
  category?: FieldCondition<string>;
  status?: FieldCondition<boolean>;
  body?: FieldCondition<string>;
}

/**
 * Sort specification. Todos that compare equal on `field` are ordered by id.
 */
export interface SortSpec {
  field: SortField;
  direction: SortDirection;
}

/**
 * A built listing query
 */
export interface TodoQuery {
  filter: TodoFilter;
  sort: SortSpec;
}

/**
 * Loosely-typed request parameters (query string, tool arguments, CLI flags).
 * A repeated parameter contributes its first value.
 */
export type QueryParams = Record<string, string | readonly string[] | undefined>;

/**
 * Validated listing parameters, one optional field per recognized parameter
 */
export interface TodoQueryOptions {
  owner?: string;
  category?: string;
  status?: boolean;
  body?: string;
  sortBy?: SortField;
  sortOrder?: SortDirection;
}

/**
 * Fields todos can be grouped by
 */
export type GroupField = "owner" | "category";

export type GroupSortField = "value" | "count";

/**
 * Validated grouping parameters
 */
export interface GroupQueryOptions {
  sortBy: GroupSortField;
  sortOrder: SortDirection;
}

/**
 * Member of an owner group: the todo's id and category
 */
export interface OwnerGroupMember {
  id: string;
  category: string;
}

/**
 * Member of a category group: the todo's id and owner
 */
export interface CategoryGroupMember {
  id: string;
  owner: string;
}

/**
 * Per-distinct-value summary produced by the grouping views
 */
export interface GroupSummary<M extends { id: string }> {
  /** The distinct value of the group field */
  value: string;
  /** Number of todos in the group (always members.length) */
  count: number;
  /** Members in identifier order */
  members: M[];
}

export type OwnerGroup = GroupSummary<OwnerGroupMember>;
export type CategoryGroup = GroupSummary<CategoryGroupMember>;

/**
 * Record store capability consumed by the query service
 */
export interface TodoStore {
  /**
   * Retrieve a todo by identifier
   * @param id - Normalized identifier
   * @returns The todo, or null if no record has this id
   */
  get(id: string): Promise<Todo | null>;

  /**
   * Find todos matching a filter
   * @param filter - Conjunction of field conditions
   * @param sort - Ordering; when omitted, todos come back in store order
   */
  find(filter: TodoFilter, sort?: SortSpec): Promise<Todo[]>;

  /**
   * Release resources held by the store
   */
  close(): Promise<void>;
}

/**
 * Options for opening a file-backed store
 */
export interface StoreOptions {
  /** Root directory for the data store (e.g., ./data) */
  root: string;
  /** Sub-directory holding one JSON file per todo (default: "todos") */
  collection?: string;
}
