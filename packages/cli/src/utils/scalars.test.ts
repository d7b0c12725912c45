import { describe, expect, it } from "vitest";

import { DEFAULT_SCALARS, UNMAPPED_SCALAR_TYPE, resolveScalars } from "./scalars";

describe("DEFAULT_SCALARS", () => {
  it("maps common custom scalars", () => {
    expect(DEFAULT_SCALARS).toMatchObject({
      DateTime: "string",
      UUID: "string",
      JSON: "unknown",
      JSONObject: "Record<string, unknown>",
    });
  });

  it("does not map builtin scalars", () => {
    expect(DEFAULT_SCALARS.String).toBeUndefined();
    expect(DEFAULT_SCALARS.ID).toBeUndefined();
  });
});

describe("resolveScalars", () => {
  it("returns the defaults when no user scalars are provided", () => {
    expect(resolveScalars()).toEqual(DEFAULT_SCALARS);
    expect(resolveScalars({})).toEqual(DEFAULT_SCALARS);
  });

  it("lets user scalars override defaults", () => {
    const result = resolveScalars({ DateTime: "Date" });

    expect(result.DateTime).toBe("Date");
    expect(result.UUID).toBe("string");
  });

  it("adds user scalars", () => {
    const result = resolveScalars({ Cursor: "string" });

    expect(result.Cursor).toBe("string");
    expect(result.JSON).toBe("unknown");
  });
});

describe("UNMAPPED_SCALAR_TYPE", () => {
  it("is unknown", () => {
    expect(UNMAPPED_SCALAR_TYPE).toBe("unknown");
  });
});
