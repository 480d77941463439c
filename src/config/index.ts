/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, deepMerge, isPlainObject } from "./defaults";
// Loader
export {
  buildConfig,
  CONFIG_FILE_NAMES,
  ConfigError,
  canRunWithoutConfigFile,
  extractInlineOptions,
  findAndLoadConfig,
  findConfigFile,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineArgValues,
  type InlineConfigOptions,
  loadConfig,
  mergeInlineConfig,
} from "./loader";
// Resolver
export { resolvePath, toDaemonConfig } from "./resolver";
// Validator
export { MAX_INTERVAL_SECONDS, validateConfig } from "./validator";
