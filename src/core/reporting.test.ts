import { describe, it, expect, vi, afterEach } from "vitest";
import {
  formatPaths,
  formatPatternWarning,
  reportPatternErrors,
} from "./reporting.js";
import { PatternError } from "../utils/errors.js";

describe("reporting", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe("formatPaths", () => {
    const paths = ["a.ts", "src/b.ts"];

    it("prints one path per line", () => {
      expect(formatPaths(paths)).toBe("a.ts\nsrc/b.ts\n");
    });

    it("terminates paths with NUL on request", () => {
      expect(formatPaths(paths, { null: true })).toBe("a.ts\0src/b.ts\0");
    });

    it("converts separators for native output", () => {
      expect(formatPaths(paths, { native: true }, "\\")).toBe("a.ts\nsrc\\b.ts\n");
    });

    it("prints nothing for no paths", () => {
      expect(formatPaths([])).toBe("");
    });
  });

  describe("pattern warnings", () => {
    const error = new PatternError("[[", "unterminated character class");

    it("formats a warning naming the pattern and reason", () => {
      expect(formatPatternWarning(error)).toBe(
        'Warning: ignoring invalid pattern "[[": unterminated character class',
      );
    });

    it("prints one warning per error to stderr", () => {
      const errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
      reportPatternErrors([error, new PatternError("x\\", "trailing escape character")]);
      expect(errorSpy.mock.calls).toEqual([
        ['Warning: ignoring invalid pattern "[[": unterminated character class'],
        ['Warning: ignoring invalid pattern "x\\": trailing escape character'],
      ]);
    });
  });
});
