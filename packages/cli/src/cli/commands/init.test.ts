import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { parseConfig } from "@/core/config";
import { ConfigError } from "@/core/errors";
import { CONFIG_FILE_NAME, initConfig } from "./init";

describe("initConfig", () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "qselect-init-"));
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("writes the default config", async () => {
    const configPath = await initConfig({ cwd: testDir });

    expect(configPath).toBe(join(testDir, CONFIG_FILE_NAME));
    const content = await readFile(configPath, "utf-8");
    expect(content).toContain('import { defineConfig } from "qselect"');
    expect(content).toContain('schema: "./schema.graphql",');
  });

  it("refuses to overwrite an existing config", async () => {
    await writeFile(join(testDir, CONFIG_FILE_NAME), "existing", "utf-8");

    await expect(initConfig({ cwd: testDir })).rejects.toBeInstanceOf(
      ConfigError,
    );
    expect(await readFile(join(testDir, CONFIG_FILE_NAME), "utf-8")).toBe(
      "existing",
    );
  });

  it("overwrites with force", async () => {
    await writeFile(join(testDir, CONFIG_FILE_NAME), "existing", "utf-8");

    await initConfig({ cwd: testDir, force: true });

    const content = await readFile(join(testDir, CONFIG_FILE_NAME), "utf-8");
    expect(content).toContain("export default defineConfig");
  });
});

describe("generated default config", () => {
  it("describes a valid configuration", () => {
    // The object literal the template writes
    const config = parseConfig({
      sources: [
        {
          name: "api",
          schema: "./schema.graphql",
          url: "http://localhost:4000/graphql",
        },
      ],
    });

    expect(config.output).toBe("./src/generated");
    expect(config.sources[0]?.name).toBe("api");
  });
});
