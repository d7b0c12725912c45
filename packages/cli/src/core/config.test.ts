import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import {
  defineConfig,
  getAllSchemaPatterns,
  getScalarsFromSource,
  getSchemaPatterns,
  getSourceByName,
  loadQselectConfig,
  parseConfig,
} from "./config";
import { ConfigError } from "./errors";

const apiSource = {
  name: "api",
  schema: "./schema.graphql",
  url: "http://localhost:4000/graphql",
};

describe("parseConfig", () => {
  it("applies the default output directory", () => {
    const config = parseConfig({ sources: [apiSource] });

    expect(config.output).toBe("./src/generated");
    expect(config.sources).toEqual([apiSource]);
  });

  it("accepts several schema globs and scalar overrides", () => {
    const config = parseConfig({
      output: "./generated",
      sources: [
        {
          name: "content-api",
          schema: ["./schema/*.graphql", "./extra.graphql"],
          runtime: "@acme/runtime",
          overrides: { scalars: { DateTime: "Date" } },
        },
      ],
    });

    expect(config.sources[0]?.schema).toEqual([
      "./schema/*.graphql",
      "./extra.graphql",
    ]);
    expect(config.sources[0]?.overrides?.scalars).toEqual({ DateTime: "Date" });
  });

  it("rejects an invalid source name", () => {
    expect(() =>
      parseConfig({ sources: [{ ...apiSource, name: "API" }] }),
    ).toThrow(
      new ConfigError(
        "Invalid configuration in config:\n  - sources.0.name: Source name must be lowercase alphanumeric with hyphens, starting with a letter",
      ),
    );
  });

  it("rejects duplicate source names", () => {
    expect(() =>
      parseConfig({ sources: [apiSource, apiSource] }, "qselect.config.ts"),
    ).toThrow(
      "Invalid configuration in qselect.config.ts:\n  - sources: Source names must be unique",
    );
  });

  it("requires at least one source", () => {
    expect(() => parseConfig({ sources: [] })).toThrow(
      "  - sources: At least one source is required",
    );
  });

  it("rejects an invalid url", () => {
    expect(() =>
      parseConfig({ sources: [{ ...apiSource, url: "not a url" }] }),
    ).toThrow("  - sources.0.url: ");
  });

  it("reports a non-object config at the root", () => {
    expect(() => parseConfig(null)).toThrow(
      "Invalid configuration in config:\n  - (root): ",
    );
  });
});

describe("config helpers", () => {
  const config = parseConfig({
    sources: [
      { name: "api", schema: "./schema.graphql" },
      {
        name: "admin",
        schema: ["./admin/*.graphql", "./schema.graphql"],
        overrides: { scalars: { JSON: "Record<string, unknown>" } },
      },
    ],
  });

  it("returns the config from defineConfig unchanged", () => {
    const input = { sources: [apiSource] };

    expect(defineConfig(input)).toBe(input);
  });

  it("finds a source by name", () => {
    expect(getSourceByName(config, "admin")?.name).toBe("admin");
    expect(getSourceByName(config, "missing")).toBeUndefined();
  });

  it("normalizes schema globs to an array", () => {
    const [api, admin] = config.sources;

    expect(api && getSchemaPatterns(api)).toEqual(["./schema.graphql"]);
    expect(admin && getSchemaPatterns(admin)).toEqual([
      "./admin/*.graphql",
      "./schema.graphql",
    ]);
  });

  it("collects schema globs across sources without duplicates", () => {
    expect(getAllSchemaPatterns(config)).toEqual([
      "./schema.graphql",
      "./admin/*.graphql",
    ]);
  });

  it("reads scalar overrides", () => {
    const [api, admin] = config.sources;

    expect(api && getScalarsFromSource(api)).toBeUndefined();
    expect(admin && getScalarsFromSource(admin)).toEqual({
      JSON: "Record<string, unknown>",
    });
  });
});

describe("loadQselectConfig", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "qselect-config-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("loads and validates the config file in cwd", async () => {
    await writeFile(
      join(testDir, "qselect.config.mjs"),
      `export default { sources: [{ name: "api", schema: "./schema.graphql" }] }\n`,
    );

    const result = await loadQselectConfig({ cwd: testDir, dotenv: false });

    expect(result.config.sources[0]?.name).toBe("api");
    expect(result.config.output).toBe("./src/generated");
    expect(result.configPath).toBe(join(testDir, "qselect.config.mjs"));
  });

  it("reports validation errors with the config path", async () => {
    await writeFile(
      join(testDir, "qselect.config.mjs"),
      `export default { sources: [] }\n`,
    );

    await expect(
      loadQselectConfig({ cwd: testDir, dotenv: false }),
    ).rejects.toThrow("  - sources: At least one source is required");
  });

  it("throws when no config exists", async () => {
    await expect(
      loadQselectConfig({ cwd: testDir, dotenv: false }),
    ).rejects.toBeInstanceOf(ConfigError);
  });
});
