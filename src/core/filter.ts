import { PatternError } from "../utils/errors.js";
import { compilePattern, matchesAny, type CompiledPattern } from "./pattern.js";

/**
 * Result of filtering: the selected paths plus every pattern that could not
 * be parsed. Invalid patterns match nothing, so `paths` is still usable.
 */
export interface FilterResult {
  paths: string[];
  errors: PatternError[];
}

/**
 * Patterns of one kind (include or exclude) compiled for repeated use.
 */
export interface PatternSet {
  readonly matchers: readonly CompiledPattern[];
  readonly errors: readonly PatternError[];
}

/**
 * Compiles every pattern, setting aside the invalid ones with their error.
 */
export function compilePatternSet(patterns: readonly string[]): PatternSet {
  const matchers: CompiledPattern[] = [];
  const errors: PatternError[] = [];

  for (const pattern of patterns) {
    try {
      matchers.push(compilePattern(pattern));
    } catch (error) {
      if (!(error instanceof PatternError)) throw error;
      errors.push(error);
    }
  }

  return { matchers, errors };
}

/**
 * A path is selected when some include pattern matches it and no exclude
 * pattern does. Without include patterns nothing is selected.
 */
export function isSelected(
  path: string,
  includes: PatternSet,
  excludes: PatternSet,
): boolean {
  return (
    matchesAny(includes.matchers, path) && !matchesAny(excludes.matchers, path)
  );
}

/**
 * Selects paths from an explicit list, keeping their input order.
 *
 * @param paths - Candidate paths, "/"-separated
 * @param includes - Patterns a path must match at least one of
 * @param excludes - Patterns a path must match none of
 */
export function filterFiles(
  paths: readonly string[],
  includes: readonly string[] = [],
  excludes: readonly string[] = [],
): FilterResult {
  const includeSet = compilePatternSet(includes);
  const excludeSet = compilePatternSet(excludes);

  return {
    paths: paths.filter((path) => isSelected(path, includeSet, excludeSet)),
    errors: [...includeSet.errors, ...excludeSet.errors],
  };
}
