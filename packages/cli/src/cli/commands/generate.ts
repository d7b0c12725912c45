import { basename } from "node:path";

import { defineCommand } from "citty";
import consola from "consola";

import { getAllSchemaPatterns, loadQselectConfig } from "@/core/config";
import { ConfigError, errorMessage } from "@/core/errors";
import { generate, generateFile } from "@/core/generator";
import { clearConsole, createWatcher, setupKeyboardInput } from "@/core/watcher";

import type { DotenvOptions } from "c12";
import type { QselectConfig } from "@/core/config";

/**
 * Determine dotenv options based on CLI arguments
 */
export function getDotenvOptions(args: {
  "no-dotenv"?: boolean;
  "env-file"?: string | string[];
}): boolean | DotenvOptions {
  if (args["no-dotenv"]) {
    return false;
  }

  if (args["env-file"]) {
    const envFiles = Array.isArray(args["env-file"])
      ? args["env-file"]
      : [args["env-file"]];
    return { fileName: envFiles };
  }

  return true;
}

/**
 * Run the generation once
 */
async function runGeneration(options: {
  config: QselectConfig;
  force: boolean;
}): Promise<void> {
  consola.start("Generating selection modules...");
  await generate({ config: options.config, force: options.force });
  consola.success("Generation complete!");
}

/**
 * Generate one module from SDL without a config file
 */
async function runSingleFile(options: {
  schema: string;
  out: string | undefined;
  runtime: string | undefined;
}): Promise<void> {
  if (!options.out) {
    throw new ConfigError("--out is required with --schema");
  }
  const result = await generateFile({
    schemaPath: options.schema,
    outputPath: options.out,
    runtimeModule: options.runtime,
  });
  consola.success(`Generated ${result.outputPath} (${result.typeCount} types)`);
}

function reportError(error: unknown): void {
  consola.error(errorMessage(error));
}

/**
 * Display the watch mode status message
 */
function displayWatchStatus(options: {
  configPath: string;
  schemaPatterns: string[];
  schemaCount: number;
  sourceCount: number;
}): void {
  const { configPath, schemaPatterns, schemaCount, sourceCount } = options;

  consola.info("");
  consola.info("Watching for changes...");
  consola.info(`  Config: ${basename(configPath)}`);
  consola.info(`  Sources: ${sourceCount}`);
  consola.info(
    `  Schemas: ${schemaPatterns.join(", ")} (${schemaCount} files)`,
  );
  consola.info("");
  consola.info("Press 'r' to force refresh, 'q' to quit");
}

/**
 * Run in watch mode - watching for file changes and regenerating
 */
async function runWatchMode(options: {
  configPath: string;
  config: QselectConfig;
  dotenv: boolean | DotenvOptions;
  force: boolean;
}): Promise<void> {
  let { configPath, config } = options;
  const { dotenv, force } = options;

  clearConsole();
  consola.info("Starting watch mode...");
  consola.info("");

  try {
    await runGeneration({ config, force });
  } catch (error) {
    reportError(error);
    consola.info("");
    consola.info("Waiting for changes...");
  }

  let resolveQuit: () => void = () => {};
  const quitPromise = new Promise<void>((resolve) => {
    resolveQuit = resolve;
  });

  const showStatus = () =>
    displayWatchStatus({
      configPath,
      schemaPatterns: getAllSchemaPatterns(config),
      schemaCount: watcher.getWatchedSchemas().length,
      sourceCount: config.sources.length,
    });

  const regenerate = async (message: string, reload: boolean) => {
    clearConsole();
    consola.info(message);
    consola.info("");

    try {
      if (reload) {
        const result = await loadQselectConfig({ configPath, dotenv });
        config = result.config;
        configPath = result.configPath;
      }
      await runGeneration({ config, force });
      showStatus();
    } catch (error) {
      reportError(error);
      consola.info("");
      consola.info("Waiting for changes...");
      consola.info("Press 'r' to force refresh, 'q' to quit");
    }
  };

  // Schema globs are read when the watcher starts; a config change that
  // edits them takes effect on the next `qselect generate --watch`
  const watcher = createWatcher({
    configPath,
    schemaPatterns: getAllSchemaPatterns(config),
    onConfigChange: () => regenerate("Config file changed, reloading...", true),
    onSchemaChange: () => regenerate("Schema changed, regenerating...", false),
    onError: (error) => {
      consola.error(`Watcher error: ${error.message}`);
    },
  });

  await watcher.start();

  const handleQuit = async () => {
    consola.info("");
    consola.info("Stopping watch mode...");
    try {
      await watcher.stop();
    } finally {
      cleanupKeyboard();
      resolveQuit();
    }
  };

  const cleanupKeyboard = setupKeyboardInput({
    onRefresh: () => {
      regenerate("Force refreshing...", false).catch(reportError);
    },
    onQuit: () => {
      handleQuit().catch(reportError);
    },
  });

  showStatus();

  await quitPromise;
}

export const generateCommand = defineCommand({
  meta: {
    name: "generate",
    description: "Generate type-safe selection modules from SDL schemas",
  },
  args: {
    config: {
      type: "string",
      alias: "c",
      description: "Path to config file",
    },
    schema: {
      type: "string",
      alias: "s",
      description: "SDL file or glob to generate from, without a config",
    },
    out: {
      type: "string",
      alias: "o",
      description: "Output file for --schema mode",
    },
    runtime: {
      type: "string",
      description: "Runtime module specifier for --schema mode",
    },
    force: {
      type: "boolean",
      alias: "f",
      description: "Force regeneration of all files including client",
      default: false,
    },
    watch: {
      type: "boolean",
      alias: "w",
      description: "Watch for file changes and regenerate automatically",
      default: false,
    },
    "env-file": {
      type: "string",
      description: "Path to env file (can be specified multiple times)",
    },
    "no-dotenv": {
      type: "boolean",
      description: "Disable automatic .env file loading",
      default: false,
    },
  },
  async run({ args }) {
    try {
      if (args.schema) {
        await runSingleFile({
          schema: args.schema,
          out: args.out,
          runtime: args.runtime,
        });
        return;
      }

      consola.start("Loading configuration...");

      const dotenv = getDotenvOptions(args);
      const { config, configPath } = await loadQselectConfig({
        configPath: args.config,
        dotenv,
      });

      if (args.watch) {
        await runWatchMode({
          configPath,
          config,
          dotenv,
          force: args.force,
        });
      } else {
        await runGeneration({ config, force: args.force });
      }
    } catch (error) {
      reportError(error);
      process.exit(1);
    }
  },
});
