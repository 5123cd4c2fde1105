// src/utils/log.ts
import pino, { type Logger } from "pino";
import envPaths from "env-paths";
import { join } from "node:path";
import { validateLogLevel } from "./type-guards.js";

export interface LogConfig {
  level?: pino.LevelWithSilent;
  toFile?: boolean;
}

/**
 * Path to the log file used by pino/file transport.
 */
export function getLogFilePath(): string {
  return join(envPaths("glob-select", { suffix: "" }).log, "debug.log");
}

function destinations(logFile: string) {
  const targets: Array<{ target: string; options?: Record<string, unknown> }> =
    [];

  // Paths go to stdout, so console logging stays on stderr
  if (process.stderr.isTTY) {
    targets.push({
      target: "pino-pretty",
      options: { colorize: true, destination: 2 },
    });
  } else {
    targets.push({ target: "pino/file", options: { destination: 2 } });
  }

  targets.push({
    target: "pino/file",
    options: { destination: logFile, mkdir: true },
  });

  return { targets };
}

export function createLogger(cfg: LogConfig = {}): Logger {
  const envLevel = validateLogLevel(process.env.LOG_LEVEL);
  const level = cfg.level ?? envLevel ?? "warn";
  if (level === "silent") return pino({ level: "silent" });

  const toFile = cfg.toFile ?? process.env.LOG_TO_FILE === "1";
  if (toFile) {
    return pino({ level, transport: destinations(getLogFilePath()) });
  }

  if (process.stderr.isTTY) {
    return pino({
      level,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: 2 },
      },
    });
  }

  return pino({ level }, pino.destination({ dest: 2, sync: true }));
}

// Singletons and helpers
export const rootLogger = createLogger();
export const getLogger = (module: string) => rootLogger.child({ module });

/**
 * Raises the shared logger to debug level, for `--verbose`.
 */
export function enableVerboseLogging(): void {
  rootLogger.level = "debug";
}
