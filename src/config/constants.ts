import { resolve } from "node:path";
import envPaths from "env-paths";
import { normalizePath } from "../utils/paths.js";

const paths = envPaths("glob-select", { suffix: "" });

/**
 * Default configuration file path
 * Can be overridden via GLOB_SELECT_CONFIG environment variable
 */
export const DEFAULT_CONFIG_PATH = process.env.GLOB_SELECT_CONFIG
  ? normalizePath(process.env.GLOB_SELECT_CONFIG)
  : resolve(paths.config, "config.json");
