import type { PatternError } from "../utils/errors.js";
import { toNativePath } from "../utils/paths.js";

export interface OutputOptions {
  /** Print paths with the platform separator instead of "/" */
  native?: boolean;
  /** Terminate paths with NUL instead of a newline */
  null?: boolean;
}

/**
 * Formats the warning printed for a pattern that could not be parsed.
 */
export function formatPatternWarning(error: PatternError): string {
  return `Warning: ignoring invalid pattern "${error.pattern}": ${error.reason}`;
}

/**
 * Prints one warning per invalid pattern to stderr.
 * Invalid patterns match nothing; the run itself still succeeds.
 */
export function reportPatternErrors(errors: readonly PatternError[]): void {
  for (const error of errors) {
    console.error(formatPatternWarning(error));
  }
}

/**
 * Renders selected paths for stdout, one per line (or NUL-terminated).
 */
export function formatPaths(
  paths: readonly string[],
  options: OutputOptions = {},
  separator?: string,
): string {
  const terminator = options.null ? "\0" : "\n";
  return paths
    .map((path) => (options.native ? toNativePath(path, separator) : path))
    .map((path) => `${path}${terminator}`)
    .join("");
}
