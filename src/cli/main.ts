import { Command, CommanderError } from "@commander-js/extra-typings";
import packageJson from "../../package.json" with { type: "json" };
import { ensureError } from "../utils/errors.js";
import { enableVerboseLogging } from "../utils/log.js";
import { registerBasePathsCommand } from "./register-base-paths-command.js";
import { registerFilterCommand } from "./register-filter-command.js";
import { registerFindCommand } from "./register-find-command.js";
import { registerInitCommand } from "./register-init-command.js";

export type GlobalOptions = { config?: string; verbose?: true };

export type ParentCommand = Command<[], GlobalOptions>;

/**
 * Entry point for the CLI application.
 * Parses arguments, registers subcommands, and dispatches to handlers.
 *
 * @param argv - The raw argv array (typically `process.argv`)
 */
export async function main(argv: string[]): Promise<number> {
  const program = new Command()
    .name(packageJson.name)
    .description(packageJson.description)
    .version(packageJson.version)
    .helpCommand(false)
    .enablePositionalOptions()
    .option("-c, --config <path>", "path to configuration file")
    .option("-v, --verbose", "enable verbose output")
    .showHelpAfterError("(add --help for additional information)")
    .showSuggestionAfterError()
    .exitOverride()
    .configureHelp({
      sortSubcommands: true,
      sortOptions: true,
      showGlobalOptions: true,
    });
  program.addHelpText(
    "after",
    `
Examples:
  glob-select -i '**/*.ts' -e '**/*.test.ts'   # Find TypeScript sources (default)
  glob-select find src -i '**' -e node_modules   # Walk another root
  git ls-files | glob-select filter -i 'docs/**' # Filter paths from stdin
  glob-select base-paths 'src/**' '/opt/app/*'   # Show where a walk would start`,
  );

  program.hook("preAction", () => {
    if (program.opts().verbose) {
      enableVerboseLogging();
    }
  });

  // Register subcommands
  registerInitCommand(program);
  registerFindCommand(program);
  registerFilterCommand(program);
  registerBasePathsCommand(program);

  try {
    await program.parseAsync(argv);
  } catch (error) {
    const err = ensureError(error);

    if (err instanceof CommanderError) {
      if (typeof err.exitCode === "number" && err.exitCode !== 0) {
        console.error(err.message);
      }
      return typeof err.exitCode === "number" ? err.exitCode : 1;
    }

    console.error(err.message);
    return 1;
  }

  return 0;
}
