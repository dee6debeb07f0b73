/**
 * Unit tests for Zod schemas
 */

import { describe, it, expect } from "vitest";
import {
  GetTodoInputSchema,
  ListTodosInputSchema,
  GroupInputSchema,
  TodoSchema,
  OwnerGroupSchema,
  CategoryGroupsOutputSchema,
  ListTodosOutputSchema,
} from "../../schemas.js";

describe("GetTodoInputSchema", () => {
  it("should accept any string id", () => {
    expect(GetTodoInputSchema.parse({ id: "bad" })).toEqual({ id: "bad" });
  });

  it("should require an id", () => {
    expect(() => GetTodoInputSchema.parse({})).toThrow(/id is required/);
    expect(() => GetTodoInputSchema.parse({ id: 42 })).toThrow();
  });
});

describe("ListTodosInputSchema", () => {
  it("should accept every filter and sort parameter", () => {
    const input = {
      owner: "Chris",
      category: "video games",
      status: "complete",
      body: "games",
      contains: "todo",
      sortby: "owner",
      sortorder: "desc",
    };
    expect(ListTodosInputSchema.parse(input)).toEqual(input);
  });

  it("should leave status values to the query layer", () => {
    expect(ListTodosInputSchema.parse({ status: "bad" })).toEqual({ status: "bad" });
  });

  it("should reject non-string parameters", () => {
    expect(() => ListTodosInputSchema.parse({ status: true })).toThrow();
  });

  it("should strip unknown parameters", () => {
    expect(ListTodosInputSchema.parse({ owner: "Pat", limit: 10 })).toEqual({ owner: "Pat" });
  });
});

describe("GroupInputSchema", () => {
  it("should accept optional sort parameters", () => {
    expect(GroupInputSchema.parse({})).toEqual({});
    expect(GroupInputSchema.parse({ sortBy: "count", sortOrder: "desc" })).toEqual({
      sortBy: "count",
      sortOrder: "desc",
    });
  });
});

describe("output schemas", () => {
  it("should require canonical todo ids", () => {
    const todo = { id: "64b7f0c2a1d3e4f5a6b7c8d9", owner: "Sam", status: true, body: "", category: "misc" };
    expect(TodoSchema.safeParse(todo).success).toBe(true);
    expect(TodoSchema.safeParse({ ...todo, id: "bad" }).success).toBe(false);
  });

  it("should require group counts to match members", () => {
    const group = { value: "Chris", count: 2, members: [{ id: "a", category: "video games" }] };
    expect(OwnerGroupSchema.safeParse(group).success).toBe(false);
    expect(OwnerGroupSchema.safeParse({ ...group, count: 1 }).success).toBe(true);
  });

  it("should validate grouped and listed payloads", () => {
    expect(
      CategoryGroupsOutputSchema.safeParse({
        groups: [{ value: "homework", count: 1, members: [{ id: "a", owner: "Pat" }] }],
        count: 1,
      }).success
    ).toBe(true);
    expect(ListTodosOutputSchema.safeParse({ todos: [], count: -1 }).success).toBe(false);
  });
});
