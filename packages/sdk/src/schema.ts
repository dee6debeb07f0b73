/**
 * JSON Schema for todo documents on disk
 */

import { Ajv, type JSONSchemaType } from "ajv";

/**
 * Stored shape of a todo. The identifier comes from the file name; an
 * embedded `id` or `_id`, when present, must agree with it.
 */
export interface StoredTodo {
  id?: string;
  _id?: string;
  owner: string;
  status: boolean;
  body: string;
  category: string;
}

export const TODO_DOCUMENT_SCHEMA: JSONSchemaType<StoredTodo> = {
  type: "object",
  properties: {
    id: { type: "string", nullable: true },
    _id: { type: "string", nullable: true },
    owner: { type: "string", minLength: 1 },
    status: { type: "boolean" },
    body: { type: "string" },
    category: { type: "string" },
  },
  required: ["owner", "status", "body", "category"],
  additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true });
const validate = ajv.compile(TODO_DOCUMENT_SCHEMA);

export type TodoDocumentCheck = { ok: true; doc: StoredTodo } | { ok: false; errors: string[] };

/**
 * Validate a parsed JSON value against the todo document schema
 * @returns The typed document, or one message per violation (e.g. "/status must be boolean")
 */
export function checkTodoDocument(value: unknown): TodoDocumentCheck {
  if (validate(value)) {
    return { ok: true, doc: value };
  }
  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || "/"} ${e.message ?? "is invalid"}`);
  return { ok: false, errors };
}
