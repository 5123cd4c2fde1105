import { hasWildcard, trimTrailingSlash } from "./pattern.js";

/**
 * Returns the literal directory every match of `pattern` lives under.
 *
 * Leading wildcard-free segments are kept up to the first segment holding a
 * wildcard. A fully literal pattern names a single file, so its parent is
 * returned instead. Relative patterns bottom out at ".", absolute ones at "/".
 *
 * @example
 * basePath("src/lib/*.ts") // "src/lib"
 * basePath("/voing/**") // "/voing"
 * basePath("README.md") // "."
 */
export function basePath(pattern: string): string {
  const segments = trimTrailingSlash(pattern).split("/");
  const literal: string[] = [];
  let reachedWildcard = false;

  for (const segment of segments) {
    if (hasWildcard(segment)) {
      reachedWildcard = true;
      break;
    }
    literal.push(segment);
  }

  if (!reachedWildcard) {
    literal.pop();
  }

  if (literal.length === 0) return ".";
  if (literal.length === 1 && literal[0] === "") return "/";
  return literal.join("/");
}

function climbsOut(base: string): boolean {
  return base === ".." || base.startsWith("../");
}

/**
 * True when every path under `base` is also under `ancestor`.
 * "." covers relative paths that stay below it and "/" absolute ones.
 */
function covers(ancestor: string, base: string): boolean {
  if (ancestor === base) return true;
  if (ancestor === ".") return !base.startsWith("/") && !climbsOut(base);
  if (ancestor === "/") return base.startsWith("/");
  return base.startsWith(`${ancestor}/`);
}

/**
 * Adds the base path of every pattern to `existing` and returns the result;
 * `existing` itself is left untouched.
 *
 * A base path already covered by one in the list is skipped. One that covers
 * entries already in the list takes the place of the first of them and the
 * rest are dropped, so no directory is walked twice.
 *
 * @example
 * getBasePaths([], ["src/**", "**", "/opt/**"]) // [".", "/opt"]
 */
export function getBasePaths(
  existing: readonly string[],
  patterns: readonly string[],
): string[] {
  let result = [...existing];

  for (const pattern of patterns) {
    const base = basePath(pattern);
    if (result.some((entry) => covers(entry, base))) continue;

    const firstCovered = result.findIndex((entry) => covers(base, entry));
    if (firstCovered === -1) {
      result.push(base);
      continue;
    }

    result = result.filter((entry) => !covers(base, entry));
    result.splice(firstCovered, 0, base);
  }

  return result;
}
