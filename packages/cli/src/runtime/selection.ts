/**
 * Selection accumulator
 *
 * A `SelectionBuilder<Owner, S>` holds two views of the same selection:
 * - `selections`: the runtime list of chosen fields, used to print the query
 *   and decode the response
 * - `S`: a phantom record type mapping each chosen field to its value type
 *
 * `select` is the only way to grow either, and it always grows both, so the
 * two cannot drift apart. Builders are immutable; every `select` returns a
 * new builder with a new static type.
 */

import { QselectError } from "../core/errors";

import type { Leaf, ObjectFieldToken, ScalarFieldToken } from "./tokens";
import type { Shape, Shaped } from "./shape";

declare const selectionType: unique symbol;

// =============================================================================
// Selection Nodes
// =============================================================================

export interface ScalarSelectionNode {
  readonly kind: "scalar";
  readonly name: string;
  readonly shape: Shape;
  readonly leaf: Leaf<unknown>;
}

export interface ObjectSelectionNode {
  readonly kind: "object";
  readonly name: string;
  readonly shape: Shape;
  readonly target: string;
  readonly selections: readonly SelectionNode[];
}

export type SelectionNode = ScalarSelectionNode | ObjectSelectionNode;

// =============================================================================
// Type-Level Accumulation
// =============================================================================

/** The selection of a builder nothing has been added to */
export type EmptySelection = Record<never, never>;

/**
 * `S` with field `K` set to `V`. The result is a flat record, so two
 * selections with the same fields produce the same type whatever order the
 * fields were added in. Re-adding `K` replaces its value type.
 */
export type Extend<S, K extends string, V> = {
  [P in keyof S | K]: P extends K ? V : P extends keyof S ? S[P] : never;
};

/**
 * Response wrapper: one readonly accessor per selected field, nothing else
 */
export type ResponseOf<S> = { readonly [K in keyof S]: S[K] };

/**
 * Raised when a selection cannot be turned into a valid query
 */
export class SelectionError extends QselectError {
  constructor(message: string) {
    super("SELECTION", message);
  }
}

// =============================================================================
// Builder
// =============================================================================

export class SelectionBuilder<TOwner extends string, TSelection = EmptySelection> {
  declare readonly [selectionType]?: TSelection;

  /** Object type this selection is built on */
  readonly owner: TOwner;
  /** Selected fields, in the order they were first added */
  readonly selections: readonly SelectionNode[];

  constructor(owner: TOwner, selections: readonly SelectionNode[] = []) {
    this.owner = owner;
    this.selections = Object.freeze([...selections]);
    Object.freeze(this);
  }

  /**
   * Add a scalar or enum field
   */
  select<TName extends string, TShape extends Shape, TValue>(
    token: ScalarFieldToken<TOwner, TName, TShape, TValue>,
  ): SelectionBuilder<
    TOwner,
    Extend<TSelection, TName, Shaped<TShape, TValue>>
  >;
  /**
   * Add an object field together with its sub-selection
   */
  select<
    TName extends string,
    TShape extends Shape,
    TTarget extends string,
    TSub,
  >(
    token: ObjectFieldToken<TOwner, TName, TShape, TTarget>,
    build: (selection: SelectionBuilder<TTarget>) => SelectionBuilder<TTarget, TSub>,
  ): SelectionBuilder<
    TOwner,
    Extend<TSelection, TName, Shaped<TShape, ResponseOf<TSub>>>
  >;
  select(
    token:
      | ScalarFieldToken<TOwner, string, Shape, unknown>
      | ObjectFieldToken<TOwner, string, Shape, string>,
    build?: (
      selection: SelectionBuilder<string>,
    ) => SelectionBuilder<string, unknown>,
  ): SelectionBuilder<TOwner, unknown> {
    if (token.owner !== this.owner) {
      throw new SelectionError(
        `Field "${token.owner}.${token.name}" cannot be selected on "${this.owner}"`,
      );
    }

    let node: SelectionNode;
    if (token.kind === "scalar") {
      node = {
        kind: "scalar",
        name: token.name,
        shape: token.shape,
        leaf: token.leaf,
      };
    } else {
      if (!build) {
        throw new SelectionError(
          `Object field "${token.owner}.${token.name}" needs a sub-selection`,
        );
      }
      const sub = build(new SelectionBuilder(token.target));
      if (sub.owner !== token.target) {
        throw new SelectionError(
          `Sub-selection for "${token.owner}.${token.name}" must be built on "${token.target}", got "${sub.owner}"`,
        );
      }
      if (sub.selections.length === 0) {
        throw new SelectionError(
          `Sub-selection for "${token.owner}.${token.name}" must select at least one field`,
        );
      }
      node = {
        kind: "object",
        name: token.name,
        shape: token.shape,
        target: token.target,
        selections: sub.selections,
      };
    }

    return new SelectionBuilder<TOwner, unknown>(
      this.owner,
      replaceOrAppend(this.selections, node),
    );
  }

  /** Names of the selected fields */
  fieldNames(): string[] {
    return this.selections.map((node) => node.name);
  }
}

/**
 * Start an empty selection on an object type
 */
export function selectionOf<TOwner extends string>(
  owner: TOwner,
): SelectionBuilder<TOwner> {
  return new SelectionBuilder(owner);
}

function replaceOrAppend(
  selections: readonly SelectionNode[],
  node: SelectionNode,
): SelectionNode[] {
  const index = selections.findIndex((s) => s.name === node.name);
  if (index === -1) {
    return [...selections, node];
  }
  return selections.map((s, i) => (i === index ? node : s));
}
