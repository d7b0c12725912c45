import { constants } from "node:fs";
import { access, mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";

import { generateClient } from "@/generators/client";
import { generateSelectionModule } from "@/generators/selection";
import { defaultLogger } from "@/utils/logger";
import { getScalarsFromSource, getSchemaPatterns } from "./config";
import { CodegenOutputError } from "./errors";
import { loadSchemaFromFiles } from "./schema";

import type { QselectLogger } from "@/utils/logger";
import type { QselectConfig, SourceConfig } from "./config";

// =============================================================================
// Hardcoded File Names
// =============================================================================

/**
 * All generated file names are hardcoded for simplicity
 */
export const FILES = {
  client: "client.ts",
  schema: "schema.ts",
} as const;

export interface GenerateOptions {
  config: QselectConfig;
  /** Overwrite client.ts even if it exists */
  force?: boolean;
  /** Logger for progress output (default: consola) */
  logger?: QselectLogger;
  /** Directory config paths are resolved against (default: process.cwd()) */
  cwd?: string;
}

/**
 * Information about generated files for a single source
 */
export interface GeneratedSourceInfo {
  /** Relative file paths from the source directory that were written */
  files: string[];
  /** Absolute paths of the SDL files the schema was read from */
  schemaFiles: string[];
}

export interface GenerateResult {
  /** Absolute path of `<output>/qselect` */
  outputDir: string;
  /** Information about generated files per source */
  generatedSources: Map<string, GeneratedSourceInfo>;
}

/**
 * Check if a file exists (Node.js compatible)
 */
async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Write a generated file, creating its directory
 *
 * @throws CodegenOutputError naming the path when the write fails
 */
export async function writeOutput(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
  } catch (error) {
    throw new CodegenOutputError(path, error);
  }
}

/**
 * Main generation orchestrator
 * Processes all configured sources and generates code for each
 *
 * Output structure:
 *   <output>/qselect/<source-name>/
 *     ├── schema.ts   # field tokens, selection builders, query root (always)
 *     └── client.ts   # runtime client bound to `url` (once, when url is set)
 */
export async function generate(
  options: GenerateOptions,
): Promise<GenerateResult> {
  const {
    config,
    force = false,
    logger = defaultLogger,
    cwd = process.cwd(),
  } = options;
  const generatedSources = new Map<string, GeneratedSourceInfo>();

  const qselectOutputDir = join(config.output, "qselect");
  const baseOutputDir = resolve(cwd, qselectOutputDir);

  for (const source of config.sources) {
    const info = await generateSource({
      source,
      sourceOutputDir: join(baseOutputDir, source.name),
      force,
      logger,
      cwd,
    });
    generatedSources.set(source.name, info);
  }

  logger.box({
    title: "Generation Complete",
    message: `Generated: ${[...generatedSources.keys()].join(", ")}\nOutput directory: ${qselectOutputDir}`,
  });

  return { outputDir: baseOutputDir, generatedSources };
}

// =============================================================================
// Per-Source Generation
// =============================================================================

interface GenerateSourceOptions {
  source: SourceConfig;
  sourceOutputDir: string;
  force: boolean;
  logger: QselectLogger;
  cwd: string;
}

/**
 * Generate one source's files. The module is built in memory before
 * anything is written, so a schema error leaves the output untouched.
 */
async function generateSource(
  options: GenerateSourceOptions,
): Promise<GeneratedSourceInfo> {
  const { source, sourceOutputDir, force, logger, cwd } = options;
  const files: string[] = [];

  logger.info(`Loading schema for: ${source.name}`);
  const { model, files: schemaFiles } = await loadSchemaFromFiles(
    getSchemaPatterns(source),
    cwd,
  );
  logger.success(
    `Schema loaded (${model.types().length} types from ${schemaFiles.length} file(s))`,
  );

  const content = generateSelectionModule(model, {
    runtimeModule: source.runtime,
    scalars: getScalarsFromSource(source),
  });

  await writeOutput(join(sourceOutputDir, FILES.schema), content);
  files.push(FILES.schema);
  logger.success(`Generated ${source.name}/${FILES.schema}`);

  if (source.url) {
    const written = await generateClientFile({
      source,
      url: source.url,
      sourceOutputDir,
      force,
      logger,
    });
    if (written) files.push(FILES.client);
  }

  return { files, schemaFiles };
}

// =============================================================================
// Client Generation
// =============================================================================

interface GenerateClientFileOptions {
  source: SourceConfig;
  url: string;
  sourceOutputDir: string;
  force: boolean;
  logger: QselectLogger;
}

/**
 * Generate client file for a source
 * Outputs to: <source-name>/client.ts
 *
 * @returns whether the file was written
 */
async function generateClientFile(
  options: GenerateClientFileOptions,
): Promise<boolean> {
  const { source, url, sourceOutputDir, force, logger } = options;

  const clientPath = join(sourceOutputDir, FILES.client);
  if ((await fileExists(clientPath)) && !force) {
    logger.info(
      `Skipping ${FILES.client} (already exists, use --force to regenerate)`,
    );
    return false;
  }

  await writeOutput(
    clientPath,
    generateClient({ url, runtimeModule: source.runtime }),
  );
  logger.success(`Generated ${source.name}/${FILES.client}`);
  return true;
}

// =============================================================================
// Single-File Generation
// =============================================================================

export interface GenerateFileOptions {
  /** Glob pattern(s) of the SDL file(s) to read */
  schemaPath: string | string[];
  /** File to write the generated module to */
  outputPath: string;
  /** Module specifier generated code imports the runtime from */
  runtimeModule?: string;
  /** Custom scalar type mappings */
  scalars?: Record<string, string>;
  /** Directory paths are resolved against (default: process.cwd()) */
  cwd?: string;
}

export interface GenerateFileResult {
  /** Absolute path of the written module */
  outputPath: string;
  /** Number of types in the schema */
  typeCount: number;
}

/**
 * Generate a selection module from SDL file(s) to a single output file,
 * without a config
 */
export async function generateFile(
  options: GenerateFileOptions,
): Promise<GenerateFileResult> {
  const cwd = options.cwd ?? process.cwd();
  const { model } = await loadSchemaFromFiles(options.schemaPath, cwd);

  const content = generateSelectionModule(model, {
    runtimeModule: options.runtimeModule,
    scalars: options.scalars,
  });

  const outputPath = resolve(cwd, options.outputPath);
  await writeOutput(outputPath, content);

  return { outputPath, typeCount: model.types().length };
}
