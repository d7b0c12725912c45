import { describe, expect, it } from "vitest";

import { defineConfig, qselect } from "./vite";

describe("Vite Plugin", () => {
  describe("qselect", () => {
    it("returns a valid Vite plugin", () => {
      const plugin = qselect();

      expect(plugin.name).toBe("qselect");
      expect(typeof plugin.configResolved).toBe("function");
      expect(typeof plugin.buildStart).toBe("function");
      expect(typeof plugin.configureServer).toBe("function");
    });

    it("accepts options", () => {
      const plugin = qselect({
        configFile: "./custom-qselect.config.ts",
        force: true,
        watch: false,
      });

      expect(plugin.name).toBe("qselect");
    });

    it("creates independent plugin instances", () => {
      expect(qselect()).not.toBe(qselect());
    });
  });

  describe("defineConfig re-export", () => {
    it("returns the config unchanged", () => {
      const config = {
        sources: [{ name: "api", schema: "./schema.graphql" }],
      };

      expect(defineConfig(config)).toBe(config);
    });
  });
});
