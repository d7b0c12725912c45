import { defineCommand, runMain } from "citty";

import { generateCommand } from "./commands/generate";
import { initCommand } from "./commands/init";

const main = defineCommand({
  meta: {
    name: "qselect",
    version: "0.1.0",
    description: "Generate type-safe GraphQL selection builders from SDL schemas",
  },
  subCommands: {
    init: initCommand,
    generate: generateCommand,
  },
});

export function run(): Promise<void> {
  return runMain(main);
}
