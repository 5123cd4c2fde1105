import { homedir } from "node:os";
import { resolve, sep } from "node:path";

/**
 * Normalize a path by expanding `~` and resolving to an absolute path.
 * No boundary or permission checks are performed here.
 * @param input - The path to normalize (supports ~ for home directory)
 */
export function normalizePath(input: string): string {
  const expanded = input.startsWith("~")
    ? input.replace(/^~/u, homedir())
    : input;
  return resolve(expanded);
}

/**
 * Converts a "/"-separated result path to the host's separator.
 */
export function toNativePath(path: string, separator: string = sep): string {
  return separator === "/" ? path : path.split("/").join(separator);
}

/**
 * Converts a host path to "/"-separated form for matching.
 */
export function toSlashPath(path: string, separator: string = sep): string {
  return separator === "/" ? path : path.split(separator).join("/");
}
