/**
 * Configuration file loading
 */

import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import * as yaml from "js-yaml";
import type { DaemonConfig } from "../types";
import { getErrorMessage } from "../utils/errors";
import { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
import { canRunWithoutConfigFile, type InlineConfigOptions, mergeInlineConfig } from "./inline";
import { toDaemonConfig } from "./resolver";
import { ConfigError, validateConfig } from "./validator";

// Re-export inline config utilities
export {
  canRunWithoutConfigFile,
  extractInlineOptions,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineArgValues,
  type InlineConfigOptions,
  mergeInlineConfig,
} from "./inline";
export { ConfigError } from "./validator";

export const CONFIG_FILE_NAMES = ["tierback.config.yaml", "tierback.config.yml", "tierback.config.json"];

/**
 * Merge defaults, apply inline overrides, validate and resolve
 */
export function buildConfig(
  raw: unknown,
  baseDir: string,
  inline: InlineConfigOptions = {},
  homeDir?: string,
): DaemonConfig {
  if (!isPlainObject(raw)) {
    throw new ConfigError("Config must be an object");
  }

  const merged = mergeInlineConfig(deepMerge({ ...DEFAULT_CONFIG }, raw), inline);
  validateConfig(merged);

  return toDaemonConfig(merged, baseDir, homeDir);
}

/**
 * Load and parse a config file
 */
export async function loadConfig(
  configPath: string,
  inline: InlineConfigOptions = {},
  homeDir?: string,
): Promise<DaemonConfig> {
  const absolutePath = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, "utf8");
  } catch {
    throw new ConfigError(`Config file not found: ${absolutePath}`);
  }

  const ext = path.extname(absolutePath).toLowerCase();
  const parsed = parseConfigContent(content, ext);

  return buildConfig(parsed, path.dirname(absolutePath), inline, homeDir);
}

function parseConfigContent(content: string, ext: string): unknown {
  if (ext === ".yaml" || ext === ".yml") {
    try {
      return yaml.load(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse YAML: ${getErrorMessage(e)}`);
    }
  }

  if (ext === ".json") {
    try {
      return JSON.parse(content);
    } catch (e) {
      throw new ConfigError(`Failed to parse JSON: ${getErrorMessage(e)}`);
    }
  }

  throw new ConfigError(`Unsupported config file format: ${ext}. Use .yaml, .yml, or .json`);
}

/**
 * Find a config file in the given directory, then in ~/.config/tierback
 */
export function findConfigFile(
  startDir: string = process.cwd(),
  homeDir: string = os.homedir(),
): string | null {
  const candidates = [
    ...CONFIG_FILE_NAMES.map((name) => path.join(startDir, name)),
    path.join(homeDir, ".config", "tierback", "config.yaml"),
  ];

  return candidates.find((candidate) => existsSync(candidate)) ?? null;
}

/**
 * Find and load a config file. Without one, inline sources are enough to
 * run on defaults.
 */
export async function findAndLoadConfig(
  configPath?: string,
  inline: InlineConfigOptions = {},
): Promise<DaemonConfig> {
  if (configPath) {
    return loadConfig(configPath, inline);
  }

  const found = findConfigFile();
  if (found) {
    return loadConfig(found, inline);
  }

  if (canRunWithoutConfigFile(inline)) {
    return buildConfig({ version: "1" }, process.cwd(), inline);
  }

  throw new ConfigError(
    "No config file found. Create tierback.config.yaml or pass --config or --source",
  );
}
