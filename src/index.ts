export {
  compilePattern,
  matches,
  matchesAny,
  type CompiledPattern,
  type Segment,
} from "./core/pattern.js";
export { basePath, getBasePaths } from "./core/base-path.js";
export {
  compilePatternSet,
  filterFiles,
  isSelected,
  type FilterResult,
  type PatternSet,
} from "./core/filter.js";
export { findFiles, type FindOptions } from "./core/find.js";
export {
  listDirectory,
  type DirectoryEntry,
  type ListDirectory,
} from "./core/listing.js";
export { PatternError, WalkError } from "./utils/errors.js";
