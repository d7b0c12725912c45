/**
 * Response decoding
 *
 * The payload a server returns is checked against a zod schema derived from
 * the request's selections. Unselected keys are stripped, so the decoded
 * value has the same keys at runtime as `ResponseOf<S>` has statically.
 */

import * as z from "zod";

import { QselectError } from "../core/errors";

import type { QueryRequest } from "./request";
import type { ResponseOf, SelectionNode } from "./selection";
import type { Shape } from "./shape";
import type { Leaf } from "./tokens";

/**
 * The payload does not match the request's selection
 */
export class ResponseShapeError extends QselectError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(
      "RESPONSE_SHAPE",
      `Response does not match the selection:\n${issues
        .map((issue) => `  - ${issue}`)
        .join("\n")}`,
    );
    this.issues = issues;
  }
}

const schemaCache = new WeakMap<QueryRequest<unknown>, z.ZodType>();

/**
 * Validate and project a response payload
 *
 * @throws ResponseShapeError if a selected field is missing or mistyped
 */
export function decodeResponse<S>(
  request: QueryRequest<S>,
  data: unknown,
): ResponseOf<S> {
  const result = schemaFor(request).safeParse(data);
  if (!result.success) {
    throw new ResponseShapeError(
      result.error.issues.map((issue) => {
        const path = issue.path.map(String).join(".");
        return `${path || "(root)"}: ${issue.message}`;
      }),
    );
  }

  const value: unknown = result.data;
  if (!isResponseOf(request, value)) {
    throw new ResponseShapeError(["(root): projected value failed validation"]);
  }
  return value;
}

/**
 * Whether a value has exactly the shape a request's response is typed with
 */
export function isResponseOf<S>(
  request: QueryRequest<S>,
  value: unknown,
): value is ResponseOf<S> {
  return schemaFor(request).safeParse(value).success;
}

function schemaFor(request: QueryRequest<unknown>): z.ZodType {
  const cached = schemaCache.get(request);
  if (cached) return cached;

  const schema = selectionSchema(request.selections);
  schemaCache.set(request, schema);
  return schema;
}

/**
 * Build the zod schema for a selection set
 */
export function selectionSchema(
  selections: readonly SelectionNode[],
): z.ZodType {
  const shape: Record<string, z.ZodType> = {};
  for (const node of selections) {
    const element =
      node.kind === "object"
        ? selectionSchema(node.selections)
        : leafSchema(node.leaf);
    shape[node.name] = shapeSchema(node.shape, element);
  }
  return z.object(shape);
}

function shapeSchema(shape: Shape, element: z.ZodType): z.ZodType {
  const base = shape.list ? z.array(shapeSchema(shape.of, element)) : element;
  return shape.nullable ? base.nullable() : base;
}

function leafSchema(leaf: Leaf<unknown>): z.ZodType {
  switch (leaf.scalar) {
    case "String":
      return z.string();
    case "Int":
      return z.number().int();
    case "Float":
      return z.number();
    case "Boolean":
      return z.boolean();
    case "ID":
      // IDs serialize as strings but servers may send numbers
      return z.union([z.string(), z.number().transform((n) => String(n))]);
  }

  const { values } = leaf;
  if (values) {
    return z
      .string()
      .refine((value) => values.includes(value), {
        message: `Expected one of ${values.join(", ")}`,
      });
  }

  // Custom scalars are passed through as sent, but must be present
  return z.unknown().refine((value) => value !== undefined && value !== null, {
    message: `Expected a ${leaf.scalar} value`,
  });
}
