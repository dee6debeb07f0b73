/**
 * Todo Query SDK
 *
 * Read-only lookup, filtered listing and grouped views over todo records
 */

// Re-export types
export type {
  Todo,
  FilterField,
  SortField,
  SortDirection,
  FieldCondition,
  TodoFilter,
  SortSpec,
  TodoQuery,
  QueryParams,
  TodoQueryOptions,
  GroupField,
  GroupSortField,
  GroupQueryOptions,
  OwnerGroupMember,
  CategoryGroupMember,
  GroupSummary,
  OwnerGroup,
  CategoryGroup,
  TodoStore,
  StoreOptions,
} from "./types.js";

// Re-export query construction and evaluation
export { escapeLiteral, literalMatch } from "./literal.js";
export type { LiteralMatchMode } from "./literal.js";
export {
  readParam,
  parseStatus,
  parseSortDirection,
  parseTodoQueryParams,
  parseGroupQueryParams,
  STATUS_PARAM_MESSAGE,
} from "./params.js";
export { buildFilter, buildSort, buildTodoQuery, DEFAULT_SORT_FIELD } from "./query-builder.js";
export { matches, compareValues, sortTodos, evaluateQuery } from "./query.js";
export {
  groupTodos,
  sortGroups,
  groupByOwner,
  groupByCategory,
  OWNER_GROUPING,
  CATEGORY_GROUPING,
} from "./aggregate.js";
export type { GroupingPlan } from "./aggregate.js";

// Re-export identifiers
export { isTodoId, parseTodoId, generateTodoId } from "./id.js";

// Re-export service and stores
export { TodoQueries } from "./service.js";
export { MemoryTodoStore } from "./store/memory.js";
export { FileTodoStore, openTodoStore } from "./store/file.js";
export { checkTodoDocument, TODO_DOCUMENT_SCHEMA } from "./schema.js";
export type { StoredTodo, TodoDocumentCheck } from "./schema.js";

// Re-export errors
export {
  TodoQueryError,
  InvalidTodoIdError,
  TodoNotFoundError,
  InvalidParameterError,
  DocumentReadError,
  ListFilesError,
  InvalidDocumentError,
} from "./errors.js";

// Re-export logging controls
export { logDebug, isDebugEnabled, formatDebugLine } from "./observability/logs.js";
export type { DebugFields } from "./observability/logs.js";
