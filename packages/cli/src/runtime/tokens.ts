/**
 * Field tokens: zero-state markers naming one field of one type.
 *
 * All the information about a field lives in the token's literal type
 * (owner, name, shape, value or target type); the runtime value mirrors it
 * so selections can be printed and responses decoded.
 */

import type { Shape } from "./shape";

declare const leafType: unique symbol;

/**
 * A scalar or enum type, carrying its TypeScript value type as a phantom
 */
export interface Leaf<T> {
  /** GraphQL type name */
  readonly scalar: string;
  /** Allowed values, for enums */
  readonly values?: readonly string[];
  readonly [leafType]?: T;
}

export function leaf<T>(scalar: string, values?: readonly string[]): Leaf<T> {
  return values ? { scalar, values } : { scalar };
}

/** Builtin scalars */
export const leaves = {
  String: leaf<string>("String"),
  Int: leaf<number>("Int"),
  Float: leaf<number>("Float"),
  Boolean: leaf<boolean>("Boolean"),
  ID: leaf<string>("ID"),
} as const;

export interface ScalarFieldToken<
  TOwner extends string,
  TName extends string,
  TShape extends Shape,
  TValue,
> {
  readonly kind: "scalar";
  readonly owner: TOwner;
  readonly name: TName;
  readonly shape: TShape;
  readonly leaf: Leaf<TValue>;
}

export interface ObjectFieldToken<
  TOwner extends string,
  TName extends string,
  TShape extends Shape,
  TTarget extends string,
> {
  readonly kind: "object";
  readonly owner: TOwner;
  readonly name: TName;
  readonly shape: TShape;
  /** Object type the field's sub-selection is built on */
  readonly target: TTarget;
}

export type FieldToken<TOwner extends string = string> =
  | ScalarFieldToken<TOwner, string, Shape, unknown>
  | ObjectFieldToken<TOwner, string, Shape, string>;

export function scalarField<
  TOwner extends string,
  TName extends string,
  TShape extends Shape,
  TValue,
>(
  owner: TOwner,
  name: TName,
  shape: TShape,
  leaf: Leaf<TValue>,
): ScalarFieldToken<TOwner, TName, TShape, TValue> {
  return { kind: "scalar", owner, name, shape, leaf };
}

export function objectField<
  TOwner extends string,
  TName extends string,
  TShape extends Shape,
  TTarget extends string,
>(
  owner: TOwner,
  name: TName,
  shape: TShape,
  target: TTarget,
): ObjectFieldToken<TOwner, TName, TShape, TTarget> {
  return { kind: "object", owner, name, shape, target };
}
