import { join } from "node:path";
import type { Logger } from "pino";
import { WalkError, ensureError } from "../utils/errors.js";
import { getLogger } from "../utils/log.js";
import { getBasePaths } from "./base-path.js";
import {
  compilePatternSet,
  isSelected,
  type FilterResult,
  type PatternSet,
} from "./filter.js";
import { matchesAny } from "./pattern.js";
import {
  listDirectory,
  type DirectoryEntry,
  type ListDirectory,
} from "./listing.js";

export interface FindOptions {
  /** Directory listing to walk with; defaults to the local filesystem */
  listDirectory?: ListDirectory;
  logger?: Logger;
}

interface WalkState {
  readonly list: ListDirectory;
  readonly logger: Logger;
  readonly includes: PatternSet;
  readonly excludes: PatternSet;
  readonly selected: string[];
}

function childPath(parent: string, name: string): string {
  if (parent === "") return name;
  if (parent === "/") return `/${name}`;
  return `${parent}/${name}`;
}

async function walk(
  state: WalkState,
  dir: string,
  relDir: string,
): Promise<void> {
  let entries: DirectoryEntry[];
  try {
    entries = await state.list(dir);
  } catch (error) {
    throw new WalkError(dir, ensureError(error));
  }

  for (const entry of entries) {
    const candidate = childPath(relDir, entry.name);

    if (entry.isDirectory) {
      if (matchesAny(state.excludes.matchers, candidate)) {
        state.logger.trace({ path: candidate }, "skipping excluded directory");
        continue;
      }
      await walk(state, join(dir, entry.name), candidate);
      continue;
    }

    if (isSelected(candidate, state.includes, state.excludes)) {
      state.selected.push(candidate);
    }
  }
}

/**
 * Walks `root` and selects every file matching an include pattern and no
 * exclude pattern.
 *
 * Only the base paths of the include patterns are walked. Results are
 * "/"-separated, relative to `root` (absolute for absolute patterns), in
 * depth-first order. Directories are never returned; an excluded directory
 * is skipped along with everything under it.
 *
 * @param root - Directory relative include patterns are resolved against
 * @throws {WalkError} If any directory on the way cannot be listed
 */
export async function findFiles(
  root: string,
  includes: readonly string[] = [],
  excludes: readonly string[] = [],
  options: FindOptions = {},
): Promise<FilterResult> {
  const includeSet = compilePatternSet(includes);
  const excludeSet = compilePatternSet(excludes);
  const errors = [...includeSet.errors, ...excludeSet.errors];

  if (includeSet.matchers.length === 0) {
    return { paths: [], errors };
  }

  const state: WalkState = {
    list: options.listDirectory ?? listDirectory,
    logger: options.logger ?? getLogger("find"),
    includes: includeSet,
    excludes: excludeSet,
    selected: [],
  };

  const sources = includeSet.matchers.map((matcher) => matcher.source);
  for (const base of getBasePaths([], sources)) {
    if (base !== "." && matchesAny(excludeSet.matchers, base)) {
      state.logger.debug({ base }, "base path is excluded");
      continue;
    }

    const isAbsolute = base.startsWith("/");
    const dir = isAbsolute ? base : join(root, base);
    const relDir = base === "." ? "" : base;

    state.logger.debug({ base, dir }, "walking base path");
    await walk(state, dir, relDir);
  }

  return { paths: state.selected, errors };
}
