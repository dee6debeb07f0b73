/**
 * Shared todo fixtures
 *
 * Four todos plus Sam's, whose id tests look up directly. Ids are fixed and
 * ordered so that identifier order is: Chris, Chris, Pat, Jamie, Sam.
 */

import type { Todo } from "@todoquery/sdk";

export const SAM_ID = "64b7f0c2a1d3e4f5a6b7c8d9";

export const CHRIS_GAMES_ID = "5f1a00000000000000000001";
export const CHRIS_MORE_GAMES_ID = "5f1a00000000000000000002";
export const PAT_HOMEWORK_ID = "5f1a00000000000000000003";
export const JAMIE_DESIGN_ID = "5f1a00000000000000000004";

const FIXTURE_TODOS: readonly Todo[] = [
  {
    id: CHRIS_GAMES_ID,
    owner: "Chris",
    status: true,
    body: "This is a video games todo",
    category: "video games",
  },
  {
    id: CHRIS_MORE_GAMES_ID,
    owner: "Chris",
    status: true,
    body: "This is another video games todo",
    category: "video games",
  },
  {
    id: PAT_HOMEWORK_ID,
    owner: "Pat",
    status: false,
    body: "This is a homework todo",
    category: "homework",
  },
  {
    id: JAMIE_DESIGN_ID,
    owner: "Jamie",
    status: false,
    body: "This is a software design todo",
    category: "software design",
  },
  {
    id: SAM_ID,
    owner: "Sam",
    status: true,
    body: "This is Sam's todo",
    category: "homework",
  },
];

/**
 * Fresh copies of the fixture todos
 */
export function fixtureTodos(): Todo[] {
  return FIXTURE_TODOS.map((todo) => ({ ...todo }));
}
