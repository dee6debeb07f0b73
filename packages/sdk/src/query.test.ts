import { describe, it, expect } from "vitest";
import {
  fixtureTodos,
  CHRIS_GAMES_ID,
  CHRIS_MORE_GAMES_ID,
  PAT_HOMEWORK_ID,
  JAMIE_DESIGN_ID,
  SAM_ID,
} from "@todoquery/testkit";
import { compareValues, evaluateQuery, matches, sortTodos } from "./query.js";
import type { Todo } from "./types.js";

const chris: Todo = {
  id: CHRIS_GAMES_ID,
  owner: "Chris",
  status: true,
  body: "This is a video games todo",
  category: "video games",
};

describe("matches", () => {
  it("should match everything with an empty filter", () => {
    expect(matches(chris, {})).toBe(true);
  });

  it("should evaluate $eq exactly", () => {
    expect(matches(chris, { owner: { $eq: "Chris" } })).toBe(true);
    expect(matches(chris, { owner: { $eq: "chris" } })).toBe(false);
    expect(matches(chris, { status: { $eq: true } })).toBe(true);
    expect(matches(chris, { status: { $eq: false } })).toBe(false);
  });

  it("should evaluate $regex against string fields", () => {
    expect(matches(chris, { owner: { $regex: /^chris$/i } })).toBe(true);
    expect(matches(chris, { body: { $regex: /games/ } })).toBe(true);
    expect(matches(chris, { category: { $regex: /^games$/ } })).toBe(false);
  });

  it("should never match $regex against a boolean field", () => {
    expect(matches(chris, { status: { $regex: /true/ } })).toBe(false);
  });

  it("should require every condition", () => {
    expect(matches(chris, { owner: { $regex: /^chris$/i }, status: { $eq: true } })).toBe(true);
    expect(matches(chris, { owner: { $regex: /^chris$/i }, status: { $eq: false } })).toBe(false);
  });

  it("should give the same answer on repeated global patterns", () => {
    const filter = { body: { $regex: /games/gi } };
    expect(matches(chris, filter)).toBe(true);
    expect(matches(chris, filter)).toBe(true);
  });
});

describe("compareValues", () => {
  it("should order strings by code point", () => {
    expect(compareValues("a", "b")).toBe(-1);
    expect(compareValues("b", "a")).toBe(1);
    expect(compareValues("a", "a")).toBe(0);
    expect(compareValues("B", "a")).toBe(-1);
  });

  it("should order characters outside the BMP after those inside it", () => {
    expect(compareValues("\u{1F600}", "\uFF5E")).toBe(1);
    expect(compareValues("\uFF5E", "\u{1F600}")).toBe(-1);
    expect(compareValues("a\u{1F600}", "a\u{1F600}")).toBe(0);
  });

  it("should order a prefix before the longer string", () => {
    expect(compareValues("ab", "abc")).toBe(-1);
    expect(compareValues("abc", "ab")).toBe(1);
  });

  it("should order false before true", () => {
    expect(compareValues(false, true)).toBe(-1);
    expect(compareValues(true, false)).toBe(1);
    expect(compareValues(true, true)).toBe(0);
  });

  it("should order booleans before strings", () => {
    expect(compareValues(true, "a")).toBe(-1);
    expect(compareValues("a", false)).toBe(1);
  });
});

describe("sortTodos", () => {
  const ids = (todos: Todo[]) => todos.map((t) => t.id);

  it("should sort ascending with ties broken by id", () => {
    const todos = fixtureTodos().reverse();
    sortTodos(todos, { field: "owner", direction: "asc" });
    expect(ids(todos)).toEqual([CHRIS_GAMES_ID, CHRIS_MORE_GAMES_ID, JAMIE_DESIGN_ID, PAT_HOMEWORK_ID, SAM_ID]);
  });

  it("should sort descending with ties still broken by ascending id", () => {
    const todos = fixtureTodos();
    sortTodos(todos, { field: "owner", direction: "desc" });
    expect(ids(todos)).toEqual([SAM_ID, PAT_HOMEWORK_ID, JAMIE_DESIGN_ID, CHRIS_GAMES_ID, CHRIS_MORE_GAMES_ID]);
  });

  it("should put incomplete todos first when sorting by status", () => {
    const todos = fixtureTodos();
    sortTodos(todos, { field: "status", direction: "asc" });
    expect(ids(todos)).toEqual([PAT_HOMEWORK_ID, JAMIE_DESIGN_ID, CHRIS_GAMES_ID, CHRIS_MORE_GAMES_ID, SAM_ID]);
  });

  it("should sort by category", () => {
    const todos = fixtureTodos();
    sortTodos(todos, { field: "category", direction: "asc" });
    expect(ids(todos)).toEqual([PAT_HOMEWORK_ID, SAM_ID, JAMIE_DESIGN_ID, CHRIS_GAMES_ID, CHRIS_MORE_GAMES_ID]);
  });
});

describe("evaluateQuery", () => {
  it("should filter then sort without touching the input", () => {
    const todos = fixtureTodos();
    const before = todos.map((t) => t.id);

    const result = evaluateQuery(todos, {
      filter: { category: { $regex: /^homework$/i } },
      sort: { field: "owner", direction: "desc" },
    });

    expect(result.map((t) => t.owner)).toEqual(["Sam", "Pat"]);
    expect(todos.map((t) => t.id)).toEqual(before);
  });

  it("should keep input order without a sort", () => {
    const todos = fixtureTodos().reverse();
    const result = evaluateQuery(todos, { filter: { status: { $eq: true } } });
    expect(result.map((t) => t.id)).toEqual([SAM_ID, CHRIS_MORE_GAMES_ID, CHRIS_GAMES_ID]);
  });

  it("should return an empty list when nothing matches", () => {
    expect(evaluateQuery(fixtureTodos(), { filter: { owner: { $eq: "Nobody" } } })).toEqual([]);
  });
});
