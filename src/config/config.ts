import { z } from "zod";

const PatternList = z
  .array(z.string())
  .default([])
  .describe(
    "POSIX-style glob patterns. Use forward slashes even on Windows; ** matches any number of directories.",
  );

/**
 * Main configuration schema.
 * Holds the default include and exclude pattern sets.
 */
export const Config = z
  .object({
    include: PatternList,
    exclude: PatternList,
  })
  .strip();

/**
 * Inferred types from Zod schemas
 */
export type Config = z.infer<typeof Config>;

/**
 * Parse and validate configuration from JSON string.
 *
 * @param jsonContent - Raw JSON configuration string
 * @returns Validated configuration object
 * @throws {ZodError} If validation fails (invalid structure, non-string patterns, etc.)
 */
export function parseConfig(jsonContent: string): Config {
  const data: unknown = JSON.parse(jsonContent);
  const result = Config.safeParse(data);
  if (!result.success) throw result.error;
  return result.data;
}

/**
 * Picks the pattern sets for a run: patterns given on the command line
 * replace the configured set of the same kind.
 */
export function resolvePatterns(
  config: Config,
  overrides: { include?: string[]; exclude?: string[] },
): Config {
  return {
    include: overrides.include ?? config.include,
    exclude: overrides.exclude ?? config.exclude,
  };
}
