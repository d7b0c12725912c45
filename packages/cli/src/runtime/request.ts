/**
 * Request descriptor: the value-level record of what a query selects,
 * typed with the same phantom selection as the builder it came from.
 */

import { SelectionError } from "./selection";

import type { SelectionBuilder, SelectionNode } from "./selection";

declare const responseType: unique symbol;

export interface QueryRequest<TSelection> {
  readonly kind: "query";
  /** Name of the schema's root query type */
  readonly rootType: string;
  readonly operationName?: string;
  readonly selections: readonly SelectionNode[];
  readonly [responseType]?: TSelection;
}

const nameRegex = /^[_A-Za-z][_0-9A-Za-z]*$/;

/**
 * Freeze a root selection into a request
 */
export function createRequest<TOwner extends string, TSelection>(
  selection: SelectionBuilder<TOwner, TSelection>,
  operationName?: string,
): QueryRequest<TSelection> {
  if (selection.selections.length === 0) {
    throw new SelectionError(
      `A query on "${selection.owner}" must select at least one field`,
    );
  }
  if (operationName !== undefined && !nameRegex.test(operationName)) {
    throw new SelectionError(
      `Invalid operation name "${operationName}": must match ${nameRegex.source}`,
    );
  }

  const request: QueryRequest<TSelection> = {
    kind: "query",
    rootType: selection.owner,
    ...(operationName !== undefined && { operationName }),
    selections: selection.selections,
  };
  return Object.freeze(request);
}

/**
 * Render a request as GraphQL document text
 *
 * @example
 * printRequest(request)
 * // query Hero {
 * //   hero {
 * //     name
 * //   }
 * // }
 */
export function printRequest(request: QueryRequest<unknown>): string {
  const head = request.operationName
    ? `query ${request.operationName}`
    : "query";
  return `${head} ${printSelections(request.selections, 0)}\n`;
}

function printSelections(
  selections: readonly SelectionNode[],
  depth: number,
): string {
  const indent = "  ".repeat(depth + 1);
  const lines = selections.map((node) =>
    node.kind === "object"
      ? `${indent}${node.name} ${printSelections(node.selections, depth + 1)}`
      : `${indent}${node.name}`,
  );
  return `{\n${lines.join("\n")}\n${"  ".repeat(depth)}}`;
}
