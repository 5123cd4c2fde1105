import type { ParentCommand } from "./main.js";
import { runFilterCommand } from "./run-select-command.js";

export function registerFilterCommand(program: ParentCommand): void {
  program
    .command("filter")
    .description("Print the given paths that are selected by the patterns")
    .argument("[paths...]", "candidate paths; read from stdin, one per line, when omitted")
    .option(
      "-i, --include <pattern...>",
      "select paths matching any of these patterns (replaces the configured set)",
    )
    .option(
      "-e, --exclude <pattern...>",
      "drop paths matching any of these patterns (replaces the configured set)",
    )
    .option("--native", "print paths with the platform's separator")
    .option("-z, --null", "terminate each printed path with NUL")
    .action(async (paths, options) => {
      await runFilterCommand(paths, {
        ...options,
        configPath: program.opts().config,
      });
    });
}
