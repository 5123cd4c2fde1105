/**
 * Error thrown when a glob pattern cannot be parsed.
 * Filtering treats such a pattern as matching nothing and reports the error
 * back to the caller instead of aborting.
 */
export class PatternError extends Error {
  readonly pattern: string;
  readonly reason: string;

  constructor(pattern: string, reason: string, cause?: Error) {
    super(`invalid pattern "${pattern}": ${reason}`, { cause });
    this.name = this.constructor.name;
    this.pattern = pattern;
    this.reason = reason;
  }
}

/**
 * Error thrown when a directory cannot be listed during a walk.
 */
export class WalkError extends Error {
  readonly path: string;

  constructor(path: string, cause: Error) {
    super(`failed to list directory '${path}': ${cause.message}`, { cause });
    this.name = this.constructor.name;
    this.path = path;
  }
}

/**
 * Error thrown when config file is not found.
 */
export class ConfigNotFoundError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(
      `Config file not found at ${path}.\nCheck the path, or create one with 'glob-select init --config <path>'.`,
    );
    this.name = this.constructor.name;
    this.path = path;
  }
}

/**
 * Error thrown when config file cannot be parsed or is invalid.
 */
export class ConfigParseError extends Error {
  readonly path: string;
  readonly originalError?: Error;

  constructor(path: string, originalError?: Error) {
    const base = originalError
      ? `Failed to load config from ${path}: ${originalError.message}`
      : `Failed to parse config from ${path}`;
    const hint =
      "Fix the JSON and glob patterns, then retry.\nTry 'glob-select --help' for details.";
    const baseWithPeriod = /[.!?]$/u.test(base) ? base : `${base}.`;
    super(`${baseWithPeriod}\n${hint}`, { cause: originalError });
    this.name = this.constructor.name;
    this.path = path;
    this.originalError = originalError;
  }
}

/**
 * Ensures that an unknown caught value is an Error object.
 * @param e - The unknown value to ensure is an Error
 */
export function ensureError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Type guard to safely check if an error is a Node.js ErrnoException
 * @param e - The error to check
 */
export function isNodeError(e: unknown): e is NodeJS.ErrnoException {
  return (
    !!e &&
    typeof e === "object" &&
    "code" in e &&
    (typeof (e as { code: unknown }).code === "string" ||
      typeof (e as { code: unknown }).code === "number")
  );
}
