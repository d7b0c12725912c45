/**
 * Type-level description of a field's list and nullability wrapping.
 *
 * A shape is a plain value at runtime (so response decoding can follow it)
 * and a literal type at compile time (so `Shaped` can compute the accessor's
 * value type). `[Character!]` is `list(true, named(false))`.
 */

export interface NamedShape<N extends boolean> {
  readonly list: false;
  readonly nullable: N;
}

export interface ListShape<N extends boolean, O extends Shape> {
  readonly list: true;
  readonly nullable: N;
  readonly of: O;
}

export type Shape = NamedShape<boolean> | ListShape<boolean, Shape>;

export function named<N extends boolean>(nullable: N): NamedShape<N> {
  return { list: false, nullable };
}

export function list<N extends boolean, O extends Shape>(
  nullable: N,
  of: O,
): ListShape<N, O> {
  return { list: true, nullable, of };
}

/**
 * Apply a shape to an element type: nullable wrappers add `| null`,
 * list wrappers produce arrays.
 */
export type Shaped<W, T> =
  W extends ListShape<infer N, infer O>
    ? N extends true
      ? Shaped<O, T>[] | null
      : Shaped<O, T>[]
    : W extends NamedShape<infer N>
      ? N extends true
        ? T | null
        : T
      : never;
