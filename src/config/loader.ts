/**
 * Configuration Loader
 *
 * Handles the config lifecycle:
 * 1. Locate xslt-chunk.toml (explicit path, else the working directory)
 * 2. Parse TOML and validate with the partial schema
 * 3. Merge with defaults (user values override defaults)
 * 4. Validate the merged result, including cross-field rules
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import TOML from '@iarna/toml';
import {
  ChunkerConfigSchema,
  PartialChunkerConfigSchema,
  formatIssues,
  type ChunkerConfig,
  type PartialChunkerConfig,
} from './schema.js';
import { DEFAULT_CONFIG, CONFIG_FILE_NAME, CONFIG_TEMPLATE } from './defaults.js';
import { CLIError, ConfigError, FileNotFoundError } from '../errors/index.js';

/**
 * Find xslt-chunk.toml in a directory. Returns null when there is none.
 */
export function findConfigFile(cwd: string = process.cwd()): string | null {
  const candidate = path.join(cwd, CONFIG_FILE_NAME);
  return fs.existsSync(candidate) ? candidate : null;
}

/**
 * Merge overrides on top of a complete config.
 *
 * Arrays are replaced, not concatenated: `helper_patterns = []` means no
 * helper patterns at all.
 */
export function mergeConfig(base: ChunkerConfig, overrides: PartialChunkerConfig): ChunkerConfig {
  return {
    max_tokens_per_chunk: overrides.max_tokens_per_chunk ?? base.max_tokens_per_chunk,
    overlap_tokens: overrides.overlap_tokens ?? base.overlap_tokens,
    main_template_split_threshold:
      overrides.main_template_split_threshold ?? base.main_template_split_threshold,
    helper_patterns: [...(overrides.helper_patterns ?? base.helper_patterns ?? [])],
    semantic: {
      target_tokens: overrides.semantic?.target_tokens ?? base.semantic.target_tokens,
      max_tokens: overrides.semantic?.max_tokens ?? base.semantic.max_tokens,
      min_tokens: overrides.semantic?.min_tokens ?? base.semantic.min_tokens,
    },
  };
}

/**
 * Validate a complete config, throwing ConfigError with one issue per
 * offending field.
 */
export function validateConfig(config: unknown, source = 'configuration'): ChunkerConfig {
  const result = ChunkerConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}`, undefined, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Parse the text of a config file into a sparse config
 *
 * @throws ConfigError on TOML syntax errors and schema violations
 */
export function parseConfigToml(content: string, source: string): PartialChunkerConfig {
  let parsed: unknown;

  try {
    parsed = TOML.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown parse error';
    throw new ConfigError(
      `Invalid TOML in config file: ${message}`,
      `Fix the syntax in ${source} or run: xslt-chunk config init --force`
    );
  }

  // Validate against the partial schema (allows missing fields)
  const validationResult = PartialChunkerConfigSchema.safeParse(parsed);

  if (!validationResult.success) {
    throw new ConfigError(
      `Invalid configuration in ${source}`,
      'Run: xslt-chunk config init --force  to restore defaults',
      formatIssues(validationResult.error)
    );
  }

  return validationResult.data;
}

/**
 * Load the effective configuration.
 *
 * @param configPath - Explicit config file; must exist
 * @param cwd - Directory searched for xslt-chunk.toml when no path is given
 * @throws FileNotFoundError if configPath does not exist
 * @throws ConfigError if the file or the merged result is invalid
 */
export function loadConfig(configPath?: string, cwd?: string): ChunkerConfig {
  let file: string | null;
  if (configPath !== undefined) {
    if (!fs.existsSync(configPath)) {
      throw new FileNotFoundError(configPath);
    }
    file = configPath;
  } else {
    file = findConfigFile(cwd);
  }

  if (file === null) {
    return mergeConfig(DEFAULT_CONFIG, {});
  }

  const userConfig = parseConfigToml(fs.readFileSync(file, 'utf-8'), file);
  return validateConfig(mergeConfig(DEFAULT_CONFIG, userConfig), `configuration in ${file}`);
}

/**
 * Write the commented default config file.
 *
 * @throws CLIError if the file exists and force is not set
 */
export function initConfigFile(target: string, force = false): string {
  const file =
    fs.existsSync(target) && fs.statSync(target).isDirectory()
      ? path.join(target, CONFIG_FILE_NAME)
      : target;

  if (fs.existsSync(file) && !force) {
    throw new CLIError(
      `Config file already exists: ${file}`,
      'Use --force to overwrite it'
    );
  }

  fs.writeFileSync(file, CONFIG_TEMPLATE, 'utf-8');
  return file;
}

/**
 * Serialize a config back to TOML (for `config show`)
 */
export function stringifyConfig(config: ChunkerConfig): string {
  return TOML.stringify({
    max_tokens_per_chunk: config.max_tokens_per_chunk,
    overlap_tokens: config.overlap_tokens,
    main_template_split_threshold: config.main_template_split_threshold,
    helper_patterns: config.helper_patterns ?? [],
    semantic: { ...config.semantic },
  });
}

/**
 * List all config values in a flat format
 * Returns entries like ['semantic.target_tokens', 4000]
 */
export function listConfig(config: ChunkerConfig): Array<[string, unknown]> {
  const entries: Array<[string, unknown]> = [];

  function flatten(obj: object, prefix = ''): void {
    const fields: Array<[string, unknown]> = Object.entries(obj);
    for (const [key, value] of fields) {
      const fullKey = prefix ? `${prefix}.${key}` : key;

      if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
        flatten(value, fullKey);
      } else {
        entries.push([fullKey, value]);
      }
    }
  }

  flatten(config);
  return entries;
}
