/**
 * qselect Vite Plugin
 *
 * Generates selection modules when Vite starts a build or the dev server,
 * and regenerates them in dev when a schema file changes.
 * Configuration is always loaded from a qselect.config.ts file.
 *
 * @example
 * ```ts
 * import { defineConfig } from "vite"
 * import { qselect } from "qselect/vite"
 *
 * export default defineConfig({
 *   plugins: [qselect()],
 * })
 * ```
 */

import { resolve } from "node:path";

import { getAllSchemaPatterns, loadQselectConfig } from "./core/config";
import { errorMessage } from "./core/errors";
import { generate } from "./core/generator";
import { createPathMatcher } from "./core/watcher";
import { createSilentLogger, createViteLogger } from "./utils/logger";

import type { Plugin, ViteDevServer } from "vite";
import type { QselectConfig } from "./core/config";
import type { QselectLogger } from "./utils/logger";

// =============================================================================
// Plugin Options
// =============================================================================

export interface QselectPluginOptions {
  /**
   * Path to config file.
   * If not provided, looks for qselect.config.{ts,js,mjs,cjs,json}
   */
  configFile?: string;

  /**
   * Force regeneration of all files including client.ts
   * @default false
   */
  force?: boolean;

  /**
   * Enable watch mode in development to regenerate on schema changes.
   * @default true
   */
  watch?: boolean;
}

// =============================================================================
// Main Plugin
// =============================================================================

/**
 * qselect Vite plugin for code generation
 */
export function qselect(options: QselectPluginOptions = {}): Plugin {
  let resolvedConfig: QselectConfig | null = null;
  let root = process.cwd();
  let logger: QselectLogger = createSilentLogger();

  const force = options.force ?? false;
  const watchEnabled = options.watch ?? true;

  return {
    name: "qselect",

    async configResolved(config) {
      logger = createViteLogger(config.logger);
      root = config.root;

      try {
        const result = await loadQselectConfig({
          configPath: options.configFile
            ? resolve(root, options.configFile)
            : undefined,
          cwd: root,
        });
        resolvedConfig = result.config;
      } catch (error) {
        // Log but don't throw: the config file may not exist yet
        logger.error(`Failed to load qselect config: ${errorMessage(error)}`);
        resolvedConfig = null;
      }
    },

    async buildStart() {
      if (!resolvedConfig) {
        logger.warn("No qselect config found, skipping generation");
        return;
      }

      try {
        logger.start("Generating selection modules...");
        await generate({ config: resolvedConfig, force, logger, cwd: root });
        logger.success("Generation complete");
      } catch (error) {
        logger.error(`Generation failed: ${errorMessage(error)}`);
        throw error;
      }
    },

    configureServer(server) {
      if (!resolvedConfig || !watchEnabled) return;

      setupDevWatcher(server, resolvedConfig, { force, logger, root });
    },
  };
}

// =============================================================================
// Dev Watcher
// =============================================================================

interface DevWatcherOptions {
  force: boolean;
  logger: QselectLogger;
  root: string;
}

/**
 * Regenerate through Vite's own file watcher when a schema file changes
 */
function setupDevWatcher(
  server: ViteDevServer,
  config: QselectConfig,
  options: DevWatcherOptions,
): void {
  const { force, logger, root } = options;

  const patterns = getAllSchemaPatterns(config);
  const isMatch = createPathMatcher(patterns, root);

  server.watcher.add(patterns.map((pattern) => resolve(root, pattern)));

  let timeout: ReturnType<typeof setTimeout> | null = null;
  let isGenerating = false;

  const regenerate = async () => {
    isGenerating = true;
    try {
      logger.info("Schema changed, regenerating...");
      await generate({ config, force, logger, cwd: root });
      logger.success("Regeneration complete");
      server.ws.send({ type: "full-reload" });
    } catch (error) {
      logger.error(`Regeneration failed: ${errorMessage(error)}`);
    } finally {
      isGenerating = false;
    }
  };

  const handleChange = (file: string) => {
    if (!isMatch(file) || isGenerating) {
      return;
    }

    if (timeout) {
      clearTimeout(timeout);
    }

    timeout = setTimeout(() => {
      timeout = null;
      void regenerate();
    }, 200);
  };

  server.watcher.on("change", handleChange);
  server.watcher.on("add", handleChange);
  server.watcher.on("unlink", handleChange);
}

// =============================================================================
// Re-exports
// =============================================================================

export { defineConfig } from "./core/config";

export type { QselectConfig, QselectConfigInput } from "./core/config";
