import { describe, expect, it } from "vitest";

import { generateClient } from "./client";

describe("generateClient", () => {
  it("generates a client file with the correct endpoint", () => {
    const result = generateClient({ url: "http://localhost:4000/graphql" });

    expect(result).toContain('const endpoint = "http://localhost:4000/graphql"');
  });

  it("imports the runtime client and transport", () => {
    const result = generateClient({ url: "http://localhost:4000/graphql" });

    expect(result).toContain(
      'import { createClient, graphqlRequestTransport } from "qselect/runtime"',
    );
  });

  it("uses a custom runtime module", () => {
    const result = generateClient({
      url: "http://localhost:4000/graphql",
      runtimeModule: "@acme/qselect-runtime",
    });

    expect(result).toContain('from "@acme/qselect-runtime"');
  });

  it("exports the client", () => {
    const result = generateClient({ url: "https://api.example.com/graphql" });

    expect(result).toContain("export const client = createClient({");
    expect(result).toContain("transport: graphqlRequestTransport(endpoint, {");
  });

  it("starts with the generated-once header", () => {
    const result = generateClient({ url: "http://localhost:4000/graphql" });

    expect(result.split("\n").slice(0, 2)).toEqual([
      "/* eslint-disable */",
      "/* qselect client - Generated once by qselect. Customize as needed. */",
    ]);
  });

  it("escapes quotes in the endpoint", () => {
    const result = generateClient({ url: 'https://example.com/"graphql"' });

    expect(result).toContain(
      'const endpoint = "https://example.com/\\"graphql\\""',
    );
  });
});
