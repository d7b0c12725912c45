/**
 * Schema loading from local SDL files
 */

import { readFile } from "node:fs/promises";
import { relative } from "node:path";

import fg from "fast-glob";

import { ConfigError } from "./errors";
import { buildSchemaModel, parseDocument } from "./parser";

import type { SchemaModel } from "./model";

export interface LoadedSchema {
  model: SchemaModel;
  /** Absolute paths of the files that made up the schema, sorted */
  files: string[];
}

/**
 * Resolve schema glob pattern(s) to a sorted list of absolute file paths
 *
 * @throws ConfigError if no file matches
 */
export async function findSchemaFiles(
  patterns: string | string[],
  cwd: string = process.cwd(),
): Promise<string[]> {
  const patternList = Array.isArray(patterns) ? patterns : [patterns];

  const files = await fg(patternList, {
    cwd,
    absolute: true,
    onlyFiles: true,
  });

  if (files.length === 0) {
    throw new ConfigError(
      `No schema files found matching: ${patternList.join(", ")}`,
    );
  }

  // Sorted so the merged declaration order does not depend on the filesystem
  return files.sort();
}

/**
 * Load and parse schema file(s) into a single model.
 *
 * Each file is parsed on its own so that error locations name the file they
 * come from; declarations are then merged and resolved together, which lets
 * one file reference types declared in another.
 */
export async function loadSchemaFromFiles(
  patterns: string | string[],
  cwd: string = process.cwd(),
): Promise<LoadedSchema> {
  const files = await findSchemaFiles(patterns, cwd);

  const documents = await Promise.all(
    files.map(async (file) => {
      const content = await readFile(file, "utf-8");
      return parseDocument(content, relative(cwd, file) || file);
    }),
  );

  return { model: buildSchemaModel(documents), files };
}
