import { existsSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";

import { defineCommand } from "citty";
import consola from "consola";

import { generateDefaultConfig } from "@/core/config";
import { ConfigError, errorMessage } from "@/core/errors";

export const CONFIG_FILE_NAME = "qselect.config.ts";

export interface InitConfigOptions {
  /** Directory to write the config file to */
  cwd: string;
  /** Overwrite an existing config file */
  force?: boolean;
}

/**
 * Write the default config file
 *
 * @returns the path of the written file
 * @throws ConfigError if the file exists and `force` is not set
 */
export async function initConfig(options: InitConfigOptions): Promise<string> {
  const configPath = join(options.cwd, CONFIG_FILE_NAME);

  if (existsSync(configPath) && !options.force) {
    throw new ConfigError(
      `Config file already exists at ${configPath}. Use --force to overwrite.`,
    );
  }

  await writeFile(configPath, generateDefaultConfig(), "utf-8");
  return configPath;
}

export const initCommand = defineCommand({
  meta: {
    name: "init",
    description: "Initialize a qselect configuration file",
  },
  args: {
    force: {
      type: "boolean",
      alias: "f",
      description: "Overwrite existing config file",
      default: false,
    },
  },
  async run({ args }) {
    try {
      await initConfig({ cwd: process.cwd(), force: args.force });
    } catch (error) {
      consola.error(errorMessage(error));
      process.exit(1);
    }

    consola.success(`Created ${CONFIG_FILE_NAME}`);
    consola.info("Next steps:");
    consola.info(`  1. Point \`schema\` in ${CONFIG_FILE_NAME} at your SDL file(s)`);
    consola.info("  2. Run `qselect generate` to generate TypeScript code");
  },
});
