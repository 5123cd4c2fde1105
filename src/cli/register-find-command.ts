import type { ParentCommand } from "./main.js";
import { runFindCommand } from "./run-select-command.js";

export function registerFindCommand(program: ParentCommand): void {
  program
    .command("find", { isDefault: true })
    .description("Walk a directory and print the files selected by the patterns (default)")
    .argument("[root]", "directory to walk", ".")
    .option(
      "-i, --include <pattern...>",
      "select files matching any of these patterns (replaces the configured set)",
    )
    .option(
      "-e, --exclude <pattern...>",
      "drop files matching any of these patterns (replaces the configured set)",
    )
    .option("--native", "print paths with the platform's separator")
    .option("-z, --null", "terminate each printed path with NUL")
    .addHelpText(
      "after",
      "\nOnly the literal directories the include patterns start with are walked.\nThis is the default command when no subcommand is specified.",
    )
    .action(async (root, options) => {
      await runFindCommand(root, {
        ...options,
        configPath: program.opts().config,
      });
    });
}
