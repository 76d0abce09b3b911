/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_RETENTION, deepMerge } from "./defaults";
// Loader
export {
  CONFIG_FILE_NAMES,
  canRunWithoutConfigFile,
  ConfigError,
  createConfigFromInlineOptions,
  extractInlineOptions,
  findAndLoadConfig,
  findConfigFile,
  hasInlineOptions,
  INLINE_CONFIG_OPTIONS,
  type InlineConfigOptions,
  loadConfig,
  mergeInlineConfig,
} from "./loader";
// Resolver
export { getRetentionLimit, resolvePaths } from "./resolver";
// Validator
export { validateConfig } from "./validator";
