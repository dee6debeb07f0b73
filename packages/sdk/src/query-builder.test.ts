import { describe, it, expect } from "vitest";
import { buildFilter, buildSort, buildTodoQuery } from "./query-builder.js";
import { InvalidParameterError } from "./errors.js";

describe("buildFilter", () => {
  it("should build an empty filter when nothing is set", () => {
    expect(buildFilter({})).toEqual({});
  });

  it("should match owner and category as whole literals", () => {
    expect(buildFilter({ owner: "Chris", category: "video games" })).toEqual({
      owner: { $regex: /^Chris$/i },
      category: { $regex: /^video games$/i },
    });
  });

  it("should match body as an escaped substring", () => {
    expect(buildFilter({ body: "a.b" })).toEqual({ body: { $regex: /a\.b/i } });
  });

  it("should match status by equality", () => {
    expect(buildFilter({ status: false })).toEqual({ status: { $eq: false } });
    expect(buildFilter({ status: true })).toEqual({ status: { $eq: true } });
  });
});

describe("buildSort", () => {
  it("should default to ascending by category", () => {
    expect(buildSort({})).toEqual({ field: "category", direction: "asc" });
  });

  it("should use the requested field and direction", () => {
    expect(buildSort({ sortBy: "owner", sortOrder: "desc" })).toEqual({
      field: "owner",
      direction: "desc",
    });
  });
});

describe("buildTodoQuery", () => {
  it("should parse and build in one step", () => {
    expect(buildTodoQuery({ owner: "Pat", sortby: "status", sortorder: "desc" })).toEqual({
      filter: { owner: { $regex: /^Pat$/i } },
      sort: { field: "status", direction: "desc" },
    });
  });

  it("should fail on an invalid status", () => {
    expect(() => buildTodoQuery({ status: "bad" })).toThrow(InvalidParameterError);
    expect(() => buildTodoQuery({ status: "bad" })).toThrow(
      "The status filter must be either 'complete' or 'incomplete'"
    );
  });

  it("should fall back to the default sort for unknown fields", () => {
    expect(buildTodoQuery({ sortby: "priority", sortorder: "desc" }).sort).toEqual({
      field: "category",
      direction: "desc",
    });
  });
});
