/**
 * Grouped views: todos summarized by owner or by category
 *
 * Invariants:
 * - Every distinct value of the group field appears exactly once
 * - count === members.length for every group
 * - Grouping always runs over the whole, unfiltered collection
 * - Members are listed in identifier order
 * - Groups with equal sort keys are ordered by value ascending
 */

import type {
  CategoryGroup,
  CategoryGroupMember,
  GroupField,
  GroupQueryOptions,
  GroupSummary,
  OwnerGroup,
  OwnerGroupMember,
  QueryParams,
  SortSpec,
  Todo,
  TodoStore,
} from "./types.js";
import { compareValues } from "./query.js";
import { parseGroupQueryParams } from "./params.js";

/**
 * How to partition todos and what to report for each member
 */
export interface GroupingPlan<M extends { id: string }> {
  /** Field whose distinct values name the groups */
  field: GroupField;
  /** Group value of a todo */
  key: (todo: Todo) => string;
  /** Member descriptor: id plus the complementary field */
  member: (todo: Todo) => M;
}

export const OWNER_GROUPING: GroupingPlan<OwnerGroupMember> = {
  field: "owner",
  key: (todo) => todo.owner,
  member: (todo) => ({ id: todo.id, category: todo.category }),
};

export const CATEGORY_GROUPING: GroupingPlan<CategoryGroupMember> = {
  field: "category",
  key: (todo) => todo.category,
  member: (todo) => ({ id: todo.id, owner: todo.owner }),
};

/**
 * Encounter order for grouping: identifier order
 */
const ID_ORDER: SortSpec = { field: "id", direction: "asc" };

/**
 * Sort group summaries by value or count
 * @param groups - Groups to sort (mutates array)
 * @param options - Sort field and direction
 */
export function sortGroups<M extends { id: string }>(
  groups: GroupSummary<M>[],
  options: GroupQueryOptions
): void {
  const sign = options.sortOrder === "desc" ? -1 : 1;

  groups.sort((a, b) => {
    const cmp = options.sortBy === "count" ? a.count - b.count : compareValues(a.value, b.value);
    if (cmp !== 0) {
      return sign * cmp;
    }
    return compareValues(a.value, b.value);
  });
}

/**
 * Partition todos by a grouping plan and sort the resulting summaries
 * @param todos - Todos in encounter order
 * @param plan - Group field and member projection
 * @param options - Sort field and direction for the groups
 * @returns One summary per distinct group value
 */
export function groupTodos<M extends { id: string }>(
  todos: readonly Todo[],
  plan: GroupingPlan<M>,
  options: GroupQueryOptions
): GroupSummary<M>[] {
  const groups = new Map<string, GroupSummary<M>>();

  for (const todo of todos) {
    const value = plan.key(todo);
    let group = groups.get(value);
    if (!group) {
      group = { value, count: 0, members: [] };
      groups.set(value, group);
    }
    group.members.push(plan.member(todo));
    group.count++;
  }

  const result = [...groups.values()];
  sortGroups(result, options);
  return result;
}

async function groupStore<M extends { id: string }>(
  store: TodoStore,
  plan: GroupingPlan<M>,
  params: QueryParams
): Promise<GroupSummary<M>[]> {
  const options = parseGroupQueryParams(params, plan.field);
  const todos = await store.find({}, ID_ORDER);
  return groupTodos(todos, plan, options);
}

/**
 * Summarize every todo by owner; members report id and category
 * @param params - Optional `sortBy` ("owner" | "count") and `sortOrder` ("asc" | "desc")
 */
export function groupByOwner(store: TodoStore, params: QueryParams = {}): Promise<OwnerGroup[]> {
  return groupStore(store, OWNER_GROUPING, params);
}

/**
 * Summarize every todo by category; members report id and owner
 * @param params - Optional `sortBy` ("category" | "count") and `sortOrder` ("asc" | "desc")
 */
export function groupByCategory(store: TodoStore, params: QueryParams = {}): Promise<CategoryGroup[]> {
  return groupStore(store, CATEGORY_GROUPING, params);
}
