/**
 * Glob matching for whole paths, one segment at a time.
 * No filesystem operations - only string manipulation.
 *
 * A pattern is split on "/" into segments. A segment that is exactly "**"
 * matches zero or more whole path segments; any other segment is matched
 * against exactly one path segment with single-segment glob rules:
 *
 * - `*` matches any run of characters, including none
 * - `?` matches one character (a full code point, so one emoji is one character)
 * - `[abc]`, `[a-z]` match one character of the class; `[!abc]` and `[^abc]`
 *   negate it, and a `]` right after the opening bracket is a class member
 * - `\x` matches `x` literally
 *
 * Every other character, `(`, `|`, `+`, `@` and `{` included, matches itself.
 * Matching is anchored and case-sensitive, and leading dots are not special:
 * `*` matches `.` and `..` like any other name.
 */
import { PatternError, ensureError } from "../utils/errors.js";

const GLOBSTAR = "**";

// Characters with a meaning in RegExp syntax; all are valid escapes under the u flag
const REGEXP_SYNTAX = /[\\^$.*+?()[\]{}|/]/u;

/**
 * One parsed pattern segment.
 */
export type Segment =
  | { readonly kind: "literal"; readonly value: string }
  | {
      readonly kind: "glob";
      readonly source: string;
      readonly test: (segment: string) => boolean;
    }
  | { readonly kind: "globstar" };

/**
 * A pattern parsed once and reusable against any number of paths.
 */
export interface CompiledPattern {
  readonly source: string;
  readonly segments: readonly Segment[];
  test(path: string): boolean;
}

/**
 * Removes trailing slashes so that a directory-style pattern such as `a/`
 * is the same as `a`. The root pattern `/` is left alone.
 */
export function trimTrailingSlash(pattern: string): string {
  const trimmed = pattern.replace(/\/+$/u, "");
  return trimmed === "" && pattern.startsWith("/") ? "/" : trimmed;
}

/**
 * True when a segment needs glob matching rather than string equality.
 */
export function hasWildcard(segment: string): boolean {
  return segment === GLOBSTAR || /[*?[\\]/u.test(segment);
}

function escapeChar(ch: string, inClass: boolean): string {
  return REGEXP_SYNTAX.test(ch) || (inClass && ch === "-") ? `\\${ch}` : ch;
}

function codePoint(ch: string): number {
  return ch.codePointAt(0) ?? 0;
}

/**
 * Reads the character class opening at `chars[start]` and returns its
 * RegExp source along with the index of the closing bracket.
 */
function readClass(
  pattern: string,
  chars: readonly string[],
  start: number,
): { source: string; end: number } {
  let i = start + 1;
  let negated = false;
  if (chars[i] === "!" || chars[i] === "^") {
    negated = true;
    i += 1;
  }

  let body = "";
  let first = true;
  while (i < chars.length) {
    let low = chars[i];
    if (low === "]" && !first) {
      return { source: `[${negated ? "^" : ""}${body}]`, end: i };
    }
    first = false;

    if (low === "\\") {
      i += 1;
      low = chars[i];
    }
    if (low === undefined) break;

    const dash = chars[i + 1];
    let high = chars[i + 2];
    if (dash !== "-" || high === undefined || high === "]") {
      body += escapeChar(low, true);
      i += 1;
      continue;
    }

    let next = i + 3;
    if (high === "\\") {
      high = chars[i + 3];
      next += 1;
      if (high === undefined) break;
    }
    if (codePoint(low) > codePoint(high)) {
      throw new PatternError(pattern, "invalid character range");
    }
    body += `${escapeChar(low, true)}-${escapeChar(high, true)}`;
    i = next;
  }

  throw new PatternError(pattern, "unterminated character class");
}

/**
 * Translates one glob segment into an anchored RegExp. Anything that is not
 * `*`, `?`, a class or an escape matches itself.
 */
function segmentToRegExp(pattern: string, segment: string): RegExp {
  const chars = Array.from(segment);
  let source = "";

  for (let i = 0; i < chars.length; i += 1) {
    const ch = chars[i];
    if (ch === undefined) break;

    if (ch === "*") {
      source += ".*";
    } else if (ch === "?") {
      source += ".";
    } else if (ch === "\\") {
      const escaped = chars[i + 1];
      if (escaped === undefined) {
        throw new PatternError(pattern, "trailing escape character");
      }
      source += escapeChar(escaped, false);
      i += 1;
    } else if (ch === "[") {
      const cls = readClass(pattern, chars, i);
      source += cls.source;
      i = cls.end;
    } else {
      source += escapeChar(ch, false);
    }
  }

  try {
    // s: `?` and `*` cover newlines too; u: `?` is one code point
    return new RegExp(`^(?:${source})$`, "su");
  } catch (error) {
    const err = ensureError(error);
    throw new PatternError(pattern, err.message, err);
  }
}

function compileSegment(pattern: string, segment: string): Segment {
  if (segment === GLOBSTAR) {
    return { kind: "globstar" };
  }
  if (!hasWildcard(segment)) {
    return { kind: "literal", value: segment };
  }

  const regexp = segmentToRegExp(pattern, segment);
  return {
    kind: "glob",
    source: segment,
    test: (input) => regexp.test(input),
  };
}

function matchSegment(segment: Segment, input: string): boolean {
  switch (segment.kind) {
    case "literal":
      return segment.value === input;
    case "glob":
      return segment.test(input);
    case "globstar":
      return true;
  }
}

function matchFrom(
  segments: readonly Segment[],
  segmentIndex: number,
  parts: readonly string[],
  partIndex: number,
): boolean {
  let si = segmentIndex;
  let pi = partIndex;

  while (si < segments.length) {
    const segment = segments[si];
    if (segment === undefined) return false;

    if (segment.kind === "globstar") {
      // Consecutive globstars behave like one
      while (segments[si + 1]?.kind === "globstar") si += 1;
      if (si === segments.length - 1) return true;
      for (let k = pi; k <= parts.length; k += 1) {
        if (matchFrom(segments, si + 1, parts, k)) return true;
      }
      return false;
    }

    const part = parts[pi];
    if (part === undefined || !matchSegment(segment, part)) return false;
    si += 1;
    pi += 1;
  }

  return pi === parts.length;
}

/**
 * Parses a pattern into segments, validating every glob segment up front.
 *
 * @throws {PatternError} If any segment is not a valid glob
 */
export function compilePattern(pattern: string): CompiledPattern {
  const segments = trimTrailingSlash(pattern)
    .split("/")
    .map((segment) => compileSegment(pattern, segment));

  return Object.freeze({
    source: pattern,
    segments,
    test: (path: string) => matchFrom(segments, 0, path.split("/"), 0),
  });
}

/**
 * Reports whether `path` matches `pattern` in full.
 *
 * @example
 * matches("docs/**", "docs/guide/intro.md") // true
 * matches("foo", "sub/foo") // false: patterns are anchored
 * @throws {PatternError} If the pattern is not a valid glob
 */
export function matches(pattern: string, path: string): boolean {
  return compilePattern(pattern).test(path);
}

/**
 * Reports whether any compiled pattern matches `path`.
 */
export function matchesAny(
  patterns: readonly CompiledPattern[],
  path: string,
): boolean {
  return patterns.some((pattern) => pattern.test(path));
}
