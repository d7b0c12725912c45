/**
 * Schema Model
 *
 * The resolved, validated in-memory form of a schema. Types live in a single
 * table keyed by name; a field's type reference points into that table by name
 * rather than embedding the definition, so self and mutual references form a
 * graph without cyclic ownership.
 *
 * Instances are built once by the parser and never mutated afterwards.
 */

import type { SourceLocation } from "./errors";

// =============================================================================
// Scalars
// =============================================================================

export const builtinScalars = [
  "String",
  "Int",
  "Float",
  "Boolean",
  "ID",
] as const;

export type ScalarTypeName = (typeof builtinScalars)[number];

export function isBuiltinScalar(name: string): name is ScalarTypeName {
  return builtinScalars.some((scalar) => scalar === name);
}

// =============================================================================
// Type References
// =============================================================================

export interface NamedTypeRef {
  kind: "named";
  name: string;
}

export interface ListTypeRef {
  kind: "list";
  ofType: TypeRef;
}

export interface NonNullTypeRef {
  kind: "nonNull";
  ofType: NamedTypeRef | ListTypeRef;
}

export type TypeRef = NamedTypeRef | ListTypeRef | NonNullTypeRef;

export function named(name: string): NamedTypeRef {
  return { kind: "named", name };
}

export function listOf(ofType: TypeRef): ListTypeRef {
  return { kind: "list", ofType };
}

export function nonNull(ofType: NamedTypeRef | ListTypeRef): NonNullTypeRef {
  return { kind: "nonNull", ofType };
}

/**
 * Name of the type at the bottom of a reference's list/non-null wrappers
 */
export function namedType(ref: TypeRef): string {
  switch (ref.kind) {
    case "named":
      return ref.name;
    case "list":
    case "nonNull":
      return namedType(ref.ofType);
  }
}

/**
 * Render a reference back to SDL notation, e.g. `[Character!]!`
 */
export function printTypeRef(ref: TypeRef): string {
  switch (ref.kind) {
    case "named":
      return ref.name;
    case "list":
      return `[${printTypeRef(ref.ofType)}]`;
    case "nonNull":
      return `${printTypeRef(ref.ofType)}!`;
  }
}

// =============================================================================
// Definitions
// =============================================================================

export interface FieldDefinition {
  name: string;
  type: TypeRef;
  description?: string;
  location?: SourceLocation;
}

export interface ObjectTypeDefinition {
  kind: "object";
  name: string;
  fields: readonly FieldDefinition[];
  description?: string;
  location?: SourceLocation;
}

export interface EnumTypeDefinition {
  kind: "enum";
  name: string;
  values: readonly string[];
  description?: string;
  location?: SourceLocation;
}

/** A custom scalar declared with `scalar Name` */
export interface ScalarTypeDefinition {
  kind: "scalar";
  name: string;
  description?: string;
  location?: SourceLocation;
}

export type TypeDefinition =
  | ObjectTypeDefinition
  | EnumTypeDefinition
  | ScalarTypeDefinition;

// =============================================================================
// Schema Model
// =============================================================================

export class SchemaModel {
  readonly #types: ReadonlyMap<string, TypeDefinition>;
  readonly #queryType: string;

  /**
   * Callers are expected to hand in an already validated table; use
   * `parseSchema` or `buildSchemaModel` rather than constructing directly.
   */
  constructor(types: Iterable<TypeDefinition>, queryType: string) {
    const table = new Map<string, TypeDefinition>();
    for (const type of types) {
      table.set(type.name, freezeDefinition(type));
    }
    this.#types = table;
    this.#queryType = queryType;
    Object.freeze(this);
  }

  /** Look up a declared type; builtin scalars are not in the table */
  lookupType(name: string): TypeDefinition | undefined {
    return this.#types.get(name);
  }

  /** Look up an object type by name */
  lookupObjectType(name: string): ObjectTypeDefinition | undefined {
    const type = this.#types.get(name);
    return type?.kind === "object" ? type : undefined;
  }

  /** Fields of an object type, in declaration order */
  fieldsOf(type: ObjectTypeDefinition | string): readonly FieldDefinition[] {
    if (typeof type !== "string") {
      return type.fields;
    }
    return this.lookupObjectType(type)?.fields ?? [];
  }

  /** Name of the root query type */
  rootQueryType(): string {
    return this.#queryType;
  }

  /** All declared types, in declaration order */
  types(): readonly TypeDefinition[] {
    return [...this.#types.values()];
  }

  objectTypes(): readonly ObjectTypeDefinition[] {
    return this.types().filter(
      (t): t is ObjectTypeDefinition => t.kind === "object",
    );
  }

  enumTypes(): readonly EnumTypeDefinition[] {
    return this.types().filter(
      (t): t is EnumTypeDefinition => t.kind === "enum",
    );
  }

  scalarTypes(): readonly ScalarTypeDefinition[] {
    return this.types().filter(
      (t): t is ScalarTypeDefinition => t.kind === "scalar",
    );
  }

  /** Whether a name denotes a leaf: builtin scalar, custom scalar or enum */
  isLeafType(name: string): boolean {
    if (isBuiltinScalar(name)) return true;
    const type = this.#types.get(name);
    return type !== undefined && type.kind !== "object";
  }

  /** Whether a name resolves at all */
  hasType(name: string): boolean {
    return isBuiltinScalar(name) || this.#types.has(name);
  }
}

function freezeDefinition<T extends TypeDefinition>(type: T): T {
  if (type.kind === "object") {
    for (const field of type.fields) {
      Object.freeze(field);
    }
    Object.freeze(type.fields);
  } else if (type.kind === "enum") {
    Object.freeze(type.values);
  }
  return Object.freeze(type);
}
