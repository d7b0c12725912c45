import { describe, expect, it } from "vitest";

import { createRequest, printRequest } from "./request";
import { SelectionError, selectionOf } from "./selection";
import { named } from "./shape";
import { leaves, objectField, scalarField } from "./tokens";

const Query = {
  hero: objectField("Query", "hero", named(true), "Character"),
  count: scalarField("Query", "count", named(false), leaves.Int),
};

const Character = {
  name: scalarField("Character", "name", named(true), leaves.String),
  homeworld: objectField("Character", "homeworld", named(true), "Planet"),
};

const Planet = {
  name: scalarField("Planet", "name", named(false), leaves.String),
};

const heroSelection = selectionOf("Query")
  .select(Query.hero, (hero) =>
    hero
      .select(Character.name)
      .select(Character.homeworld, (planet) => planet.select(Planet.name)),
  )
  .select(Query.count);

describe("createRequest", () => {
  it("records the root type and selections", () => {
    const request = createRequest(heroSelection, "Hero");

    expect(request.kind).toBe("query");
    expect(request.rootType).toBe("Query");
    expect(request.operationName).toBe("Hero");
    expect(request.selections).toBe(heroSelection.selections);
  });

  it("leaves the operation name out when none is given", () => {
    const request = createRequest(selectionOf("Query").select(Query.count));

    expect("operationName" in request).toBe(false);
  });

  it("is frozen", () => {
    expect(Object.isFrozen(createRequest(heroSelection))).toBe(true);
  });

  it("rejects an empty selection", () => {
    expect(() => createRequest(selectionOf("Query"))).toThrow(
      new SelectionError('A query on "Query" must select at least one field'),
    );
  });

  it("rejects an invalid operation name", () => {
    expect(() => createRequest(heroSelection, "1bad")).toThrow(
      'Invalid operation name "1bad": must match ^[_A-Za-z][_0-9A-Za-z]*$',
    );
  });
});

describe("printRequest", () => {
  it("prints nested selections with two-space indentation", () => {
    expect(printRequest(createRequest(heroSelection, "Hero"))).toBe(
      [
        "query Hero {",
        "  hero {",
        "    name",
        "    homeworld {",
        "      name",
        "    }",
        "  }",
        "  count",
        "}",
        "",
      ].join("\n"),
    );
  });

  it("prints an anonymous query", () => {
    const request = createRequest(selectionOf("Query").select(Query.count));

    expect(printRequest(request)).toBe("query {\n  count\n}\n");
  });

  it("prints fields in selection order", () => {
    const request = createRequest(
      selectionOf("Query")
        .select(Query.count)
        .select(Query.hero, (hero) => hero.select(Character.name)),
    );

    expect(printRequest(request)).toBe(
      "query {\n  count\n  hero {\n    name\n  }\n}\n",
    );
  });
});
