import { dirname } from "node:path";

import { loadConfig } from "c12";
import * as z from "zod";

import { ConfigError } from "./errors";

import type { DotenvOptions } from "c12";

/**
 * Options for loading the qselect config
 */
export interface LoadConfigOptions {
  /** Path to the config file */
  configPath?: string;
  /** Dotenv configuration - true to load .env, false to disable, or DotenvOptions object */
  dotenv?: boolean | DotenvOptions;
  /** Directory to search for the config file (default: process.cwd()) */
  cwd?: string;
}

/**
 * Result of loading the qselect config
 */
export interface LoadConfigResult {
  /** The validated configuration */
  config: QselectConfig;
  /** The resolved path to the config file */
  configPath: string;
}

// =============================================================================
// Source Schemas
// =============================================================================

/**
 * Name pattern for sources - lowercase alphanumeric with hyphens
 */
export const sourceNameSchema = z
  .string()
  .min(1, "Source name is required")
  .regex(
    /^[a-z][a-z0-9-]*$/,
    "Source name must be lowercase alphanumeric with hyphens, starting with a letter",
  );

/**
 * Source-level overrides
 */
export const overridesSchema = z.object({
  /** Custom scalar type mappings, e.g. { DateTime: "Date" } */
  scalars: z.record(z.string(), z.string()).optional(),
});

export type OverridesConfig = z.infer<typeof overridesSchema>;

/**
 * One schema to generate a selection module for
 */
export const sourceSchema = z.object({
  /** Unique name for this source (used for output directory) */
  name: sourceNameSchema,
  /** Glob pattern(s) for SDL schema files (.graphql) */
  schema: z.union([
    z.string().min(1, "Schema glob is required"),
    z.array(z.string().min(1)).min(1, "At least one schema glob is required"),
  ]),
  /** Endpoint the generated client.ts sends requests to */
  url: z.url().optional(),
  /** Module specifier generated code imports the runtime from */
  runtime: z.string().min(1).optional(),
  /** Optional overrides for custom scalars */
  overrides: overridesSchema.optional(),
});

export type SourceConfig = z.infer<typeof sourceSchema>;

// =============================================================================
// Main Config Schema
// =============================================================================

/**
 * Main qselect configuration schema
 */
export const qselectConfigSchema = z.object({
  /** Output directory for all generated files (default: ./src/generated) */
  output: z.string().default("./src/generated"),
  /** Array of schemas to generate from */
  sources: z
    .array(sourceSchema)
    .min(1, "At least one source is required")
    .refine(
      (sources) => new Set(sources.map((s) => s.name)).size === sources.length,
      "Source names must be unique",
    ),
});

/**
 * The normalized configuration type used internally (after parsing)
 */
export type QselectConfig = z.output<typeof qselectConfigSchema>;

/**
 * Input configuration type (before defaults applied)
 */
export type QselectConfigInput = z.input<typeof qselectConfigSchema>;

/**
 * Config schema for validation
 */
export const configSchema = qselectConfigSchema;

// =============================================================================
// Helper Functions
// =============================================================================

/**
 * Helper for defining a typed config
 */
export function defineConfig(config: QselectConfigInput): QselectConfigInput {
  return config;
}

/**
 * Validate a raw config object
 *
 * @throws ConfigError listing every issue as `path: message`
 */
export function parseConfig(raw: unknown, origin = "config"): QselectConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.issues
      .map((e) => `  - ${e.path.join(".") || "(root)"}: ${e.message}`)
      .join("\n");
    throw new ConfigError(`Invalid configuration in ${origin}:\n${errors}`);
  }
  return result.data;
}

/**
 * Load and validate the qselect config file
 */
export async function loadQselectConfig(
  options: LoadConfigOptions = {},
): Promise<LoadConfigResult> {
  // If a config path is provided, use its directory as cwd for dotenv resolution
  const cwd =
    options.cwd ?? (options.configPath ? dirname(options.configPath) : undefined);

  const { config, configFile } = await loadConfig<QselectConfigInput>({
    name: "qselect",
    cwd,
    configFile: options.configPath,
    rcFile: false,
    globalRc: false,
    dotenv: options.dotenv ?? true,
  });

  if (!config || Object.keys(config).length === 0) {
    throw new ConfigError(
      "No configuration found. Run 'qselect init' to create a config file, or specify a config file with --config.",
    );
  }

  const resolvedPath = configFile ?? options.configPath ?? "qselect.config.ts";

  return {
    config: parseConfig(config, resolvedPath),
    configPath: resolvedPath,
  };
}

// =============================================================================
// Default Config Generator
// =============================================================================

/**
 * Generate a config file content
 */
export function generateDefaultConfig(): string {
  return `import { defineConfig } from "qselect"

export default defineConfig({
	sources: [
		{
			name: "api",
			schema: "./schema.graphql",
			// Or several files:
			// schema: ["./schema/**/*.graphql"],
			url: "http://localhost:4000/graphql",
			// overrides: {
			// 	scalars: { DateTime: "Date" },
			// },
		},
	],
})
`;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Get a source by name from the config
 */
export function getSourceByName(
  config: QselectConfig,
  name: string,
): SourceConfig | undefined {
  return config.sources.find((s) => s.name === name);
}

/**
 * Schema globs of a source as an array
 */
export function getSchemaPatterns(source: SourceConfig): string[] {
  return Array.isArray(source.schema) ? source.schema : [source.schema];
}

/**
 * Schema globs of every source, deduplicated
 */
export function getAllSchemaPatterns(config: QselectConfig): string[] {
  return [...new Set(config.sources.flatMap(getSchemaPatterns))];
}

/**
 * Get scalars configuration from a source (from overrides)
 */
export function getScalarsFromSource(
  source: SourceConfig,
): Record<string, string> | undefined {
  return source.overrides?.scalars;
}
