import { DEFAULT_CONFIG_PATH } from "../config/constants.js";
import { createSampleConfig } from "../config/loader.js";
import type { ParentCommand } from "./main.js";

export function registerInitCommand(program: ParentCommand): void {
  program
    .command("init")
    .description("Initialize a new configuration file")
    .option("-f, --force", "Overwrite existing config file", false)
    .addHelpText(
      "after",
      "\nThis command creates a sample configuration file with default include and exclude patterns.",
    )
    .action(async (options) => {
      const parentOpts = program.opts();
      const configPath = parentOpts.config || DEFAULT_CONFIG_PATH;
      await createSampleConfig(configPath, options.force);
    });
}
