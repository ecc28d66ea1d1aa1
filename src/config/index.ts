/**
 * Config Module
 *
 * Exports for programmatic config access.
 * CLI users interact via `xslt-chunk config` commands.
 */

// Schema and types
export {
  ChunkerConfigSchema,
  PartialChunkerConfigSchema,
  SemanticConfigSchema,
  HelperPresetSchema,
  formatIssues,
} from './schema.js';
export type {
  ChunkerConfig,
  PartialChunkerConfig,
  SemanticConfig,
  HelperPreset,
} from './schema.js';

// Defaults
export {
  DEFAULT_CONFIG,
  DEFAULT_HELPER_PATTERNS,
  HELPER_PATTERN_PRESETS,
  CONFIG_FILE_NAME,
  CONFIG_TEMPLATE,
} from './defaults.js';

// Loader functions
export {
  loadConfig,
  findConfigFile,
  mergeConfig,
  validateConfig,
  parseConfigToml,
  initConfigFile,
  stringifyConfig,
  listConfig,
} from './loader.js';
