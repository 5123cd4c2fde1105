import { resolvePatterns } from "../config/config.js";
import { loadConfig } from "../config/loader.js";
import { filterFiles } from "../core/filter.js";
import { findFiles } from "../core/find.js";
import { formatPaths, reportPatternErrors } from "../core/reporting.js";
import { getLogger } from "../utils/log.js";
import { normalizePath, toSlashPath } from "../utils/paths.js";

export interface SelectCommandOptions {
  include?: string[];
  exclude?: string[];
  native?: boolean;
  null?: boolean;
  configPath?: string;
}

async function loadPatterns(options: SelectCommandOptions) {
  const config = await loadConfig(options.configPath);
  return resolvePatterns(config, options);
}

function writePaths(paths: string[], options: SelectCommandOptions): void {
  if (paths.length === 0) return;
  process.stdout.write(formatPaths(paths, options));
}

/**
 * Reads non-empty lines from a byte stream. Chunks are joined before
 * decoding, so a UTF-8 sequence split across chunks survives.
 */
export async function readLines(
  input: AsyncIterable<Buffer | string>,
): Promise<string[]> {
  const chunks: Buffer[] = [];
  for await (const chunk of input) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  return Buffer.concat(chunks)
    .toString("utf8")
    .split(/\r?\n/u)
    .filter((line) => line !== "");
}

export async function runFindCommand(
  root: string,
  options: SelectCommandOptions,
): Promise<void> {
  const { include, exclude } = await loadPatterns(options);
  const walkRoot = normalizePath(root);
  const logger = getLogger("find");

  logger.debug({ root: walkRoot, include, exclude }, "finding files");
  const result = await findFiles(walkRoot, include, exclude, { logger });

  reportPatternErrors(result.errors);
  writePaths(result.paths, options);
}

export async function runFilterCommand(
  paths: string[],
  options: SelectCommandOptions,
): Promise<void> {
  const { include, exclude } = await loadPatterns(options);
  const candidates = paths.length > 0 ? paths : await readLines(process.stdin);

  const result = filterFiles(candidates.map((p) => toSlashPath(p)), include, exclude);

  reportPatternErrors(result.errors);
  writePaths(result.paths, options);
}
