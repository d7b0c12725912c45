import { describe, expect, it } from "vitest";

import {
  SchemaModel,
  isBuiltinScalar,
  listOf,
  named,
  namedType,
  nonNull,
  printTypeRef,
} from "./model";

import type { TypeDefinition } from "./model";

const definitions: TypeDefinition[] = [
  {
    kind: "object",
    name: "Query",
    fields: [{ name: "hero", type: named("Character") }],
  },
  {
    kind: "object",
    name: "Character",
    fields: [
      { name: "name", type: nonNull(named("String")) },
      { name: "friends", type: listOf(named("Character")) },
    ],
  },
  { kind: "enum", name: "Episode", values: ["NEWHOPE", "JEDI"] },
  { kind: "scalar", name: "DateTime" },
];

describe("type references", () => {
  it("finds the named type under wrappers", () => {
    expect(namedType(nonNull(listOf(nonNull(named("Character")))))).toBe(
      "Character",
    );
  });

  it("prints SDL notation", () => {
    expect(printTypeRef(nonNull(listOf(nonNull(named("Character")))))).toBe(
      "[Character!]!",
    );
    expect(printTypeRef(listOf(named("Int")))).toBe("[Int]");
  });
});

describe("isBuiltinScalar", () => {
  it("recognizes the five builtin scalars", () => {
    for (const name of ["String", "Int", "Float", "Boolean", "ID"]) {
      expect(isBuiltinScalar(name)).toBe(true);
    }
  });

  it("is case-sensitive", () => {
    expect(isBuiltinScalar("string")).toBe(false);
    expect(isBuiltinScalar("DateTime")).toBe(false);
  });
});

describe("SchemaModel", () => {
  const model = new SchemaModel(definitions, "Query");

  it("looks up declared types by name", () => {
    expect(model.lookupType("Episode")?.kind).toBe("enum");
    expect(model.lookupType("String")).toBeUndefined();
    expect(model.lookupObjectType("Episode")).toBeUndefined();
    expect(model.lookupObjectType("Character")?.name).toBe("Character");
  });

  it("lists fields by type or name", () => {
    const character = model.lookupObjectType("Character");

    expect(model.fieldsOf("Character").map((f) => f.name)).toEqual([
      "name",
      "friends",
    ]);
    expect(character && model.fieldsOf(character)).toEqual(
      model.fieldsOf("Character"),
    );
    expect(model.fieldsOf("Missing")).toEqual([]);
  });

  it("groups types by kind in declaration order", () => {
    expect(model.objectTypes().map((t) => t.name)).toEqual([
      "Query",
      "Character",
    ]);
    expect(model.enumTypes().map((t) => t.name)).toEqual(["Episode"]);
    expect(model.scalarTypes().map((t) => t.name)).toEqual(["DateTime"]);
  });

  it("classifies leaf types", () => {
    expect(model.isLeafType("Int")).toBe(true);
    expect(model.isLeafType("Episode")).toBe(true);
    expect(model.isLeafType("DateTime")).toBe(true);
    expect(model.isLeafType("Character")).toBe(false);
    expect(model.isLeafType("Missing")).toBe(false);
  });

  it("resolves builtin and declared names", () => {
    expect(model.hasType("ID")).toBe(true);
    expect(model.hasType("Character")).toBe(true);
    expect(model.hasType("Planet")).toBe(false);
  });

  it("exposes the root query type", () => {
    expect(model.rootQueryType()).toBe("Query");
  });

  it("freezes definitions", () => {
    const character = model.lookupObjectType("Character");

    expect(Object.isFrozen(model)).toBe(true);
    expect(Object.isFrozen(character)).toBe(true);
    expect(Object.isFrozen(character?.fields)).toBe(true);
    expect(Object.isFrozen(character?.fields[0])).toBe(true);
    expect(Object.isFrozen(model.lookupType("Episode"))).toBe(true);
  });
});
