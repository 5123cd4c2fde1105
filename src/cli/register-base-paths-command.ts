import type { ParentCommand } from "./main.js";
import { getBasePaths } from "../core/base-path.js";

export function registerBasePathsCommand(program: ParentCommand): void {
  program
    .command("base-paths")
    .description("Print the directories a walk for these patterns starts from")
    .argument("<patterns...>", "glob patterns")
    .action((patterns) => {
      for (const base of getBasePaths([], patterns)) {
        console.log(base);
      }
    });
}
