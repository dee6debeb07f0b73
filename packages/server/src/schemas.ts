/**
 * Zod schemas for validating tool inputs and outputs
 */

import { z } from "zod";

const ParamSchema = z.string();

export const GetTodoInputSchema = z.object({
  id: z.string({ required_error: "id is required" }),
});

export const ListTodosInputSchema = z.object({
  owner: ParamSchema.optional(),
  category: ParamSchema.optional(),
  status: ParamSchema.optional(),
  body: ParamSchema.optional(),
  contains: ParamSchema.optional(),
  sortby: ParamSchema.optional(),
  sortorder: ParamSchema.optional(),
});

export const GroupInputSchema = z.object({
  sortBy: ParamSchema.optional(),
  sortOrder: ParamSchema.optional(),
});

export const TodoSchema = z.object({
  id: z.string().regex(/^[0-9a-f]{24}$/),
  owner: z.string(),
  status: z.boolean(),
  body: z.string(),
  category: z.string(),
});

function groupSummarySchema<M extends z.ZodTypeAny>(member: M) {
  return z
    .object({
      value: z.string(),
      count: z.number().int().nonnegative(),
      members: z.array(member),
    })
    .refine((group) => group.count === group.members.length, {
      message: "count must equal the number of members",
    });
}

export const OwnerGroupSchema = groupSummarySchema(z.object({ id: z.string(), category: z.string() }));
export const CategoryGroupSchema = groupSummarySchema(z.object({ id: z.string(), owner: z.string() }));

export const GetTodoOutputSchema = z.object({ todo: TodoSchema });

export const ListTodosOutputSchema = z.object({
  todos: z.array(TodoSchema),
  count: z.number().int().nonnegative(),
});

export const OwnerGroupsOutputSchema = z.object({
  groups: z.array(OwnerGroupSchema),
  count: z.number().int().nonnegative(),
});

export const CategoryGroupsOutputSchema = z.object({
  groups: z.array(CategoryGroupSchema),
  count: z.number().int().nonnegative(),
});

export type GetTodoInput = z.infer<typeof GetTodoInputSchema>;
export type ListTodosInput = z.infer<typeof ListTodosInputSchema>;
export type GroupInput = z.infer<typeof GroupInputSchema>;
export type GetTodoOutput = z.infer<typeof GetTodoOutputSchema>;
export type ListTodosOutput = z.infer<typeof ListTodosOutputSchema>;
export type OwnerGroupsOutput = z.infer<typeof OwnerGroupsOutputSchema>;
export type CategoryGroupsOutput = z.infer<typeof CategoryGroupsOutputSchema>;
