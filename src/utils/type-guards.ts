import type { LevelWithSilent } from "pino";

/**
 * Type guard to check if a string is a valid Pino log level
 */
export function isPinoLogLevel(value: unknown): value is LevelWithSilent {
  const validLevels = [
    "silent",
    "fatal",
    "error",
    "warn",
    "info",
    "debug",
    "trace",
  ] as const;
  return (
    typeof value === "string" &&
    (validLevels as readonly string[]).includes(value)
  );
}

/**
 * Validates and returns a Pino log level, or undefined if invalid
 */
export function validateLogLevel(value: unknown): LevelWithSilent | undefined {
  return isPinoLogLevel(value) ? value : undefined;
}
