/**
 * Config Module Tests
 *
 * Tests the configuration loading, validation, and merging logic.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { ChunkerConfigSchema, PartialChunkerConfigSchema } from '../schema.js';
import {
  DEFAULT_CONFIG,
  CONFIG_TEMPLATE,
  HELPER_PATTERN_PRESETS,
} from '../defaults.js';
import {
  loadConfig,
  mergeConfig,
  parseConfigToml,
  initConfigFile,
  findConfigFile,
  listConfig,
  stringifyConfig,
} from '../loader.js';
import { CLIError, ConfigError, FileNotFoundError } from '../../errors/index.js';

// Use a temp directory for tests to avoid touching a real config
const TEST_DIR = path.join(os.tmpdir(), 'xslt-chunk-config-test-' + process.pid);
const TEST_CONFIG_PATH = path.join(TEST_DIR, 'xslt-chunk.toml');

describe('Config Schema', () => {
  it('validates the default config', () => {
    expect(ChunkerConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
  });

  it('rejects a non-positive chunk ceiling', () => {
    const result = ChunkerConfigSchema.safeParse({ ...DEFAULT_CONFIG, max_tokens_per_chunk: 0 });
    expect(result.success).toBe(false);
  });

  it('rejects overlap that is not below the ceiling', () => {
    const result = ChunkerConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      max_tokens_per_chunk: 500,
      overlap_tokens: 500,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['overlap_tokens']);
    }
  });

  it('rejects semantic sizes out of order', () => {
    const result = ChunkerConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      semantic: { target_tokens: 4000, max_tokens: 3000, min_tokens: 1000 },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((i) => i.path.join('.'))).toEqual(['semantic.target_tokens']);
    }
  });

  it('rejects a split threshold below the semantic target', () => {
    const result = ChunkerConfigSchema.safeParse({
      ...DEFAULT_CONFIG,
      main_template_split_threshold: 3000,
    });

    expect(result.success).toBe(false);
  });

  it('allows deeply partial config', () => {
    const result = PartialChunkerConfigSchema.safeParse({ semantic: { target_tokens: 3000 } });
    expect(result.success).toBe(true);
  });

  it('rejects wrong types in partial config', () => {
    const result = PartialChunkerConfigSchema.safeParse({ helper_patterns: 'vmf' });
    expect(result.success).toBe(false);
  });
});

describe('Config Defaults', () => {
  it('has the documented default values', () => {
    expect(DEFAULT_CONFIG.max_tokens_per_chunk).toBe(15000);
    expect(DEFAULT_CONFIG.overlap_tokens).toBe(500);
    expect(DEFAULT_CONFIG.main_template_split_threshold).toBe(10000);
    expect(DEFAULT_CONFIG.helper_patterns).toEqual(['(?:vmf:)?vmf\\d+']);
    expect(DEFAULT_CONFIG.semantic).toEqual({
      target_tokens: 4000,
      max_tokens: 6000,
      min_tokens: 1000,
    });
  });

  it('has a compilable regex for every preset', () => {
    for (const pattern of Object.values(HELPER_PATTERN_PRESETS)) {
      expect(() => new RegExp(pattern)).not.toThrow();
    }
  });

  it('template parses back to the defaults', () => {
    const parsed = parseConfigToml(CONFIG_TEMPLATE, 'template');
    expect(mergeConfig(DEFAULT_CONFIG, parsed)).toEqual(DEFAULT_CONFIG);
    expect(parsed.helper_patterns).toEqual([HELPER_PATTERN_PRESETS.mapforce]);
  });
});

describe('mergeConfig', () => {
  it('overrides nested values and keeps the rest', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, { semantic: { min_tokens: 500 } });

    expect(merged.semantic).toEqual({ target_tokens: 4000, max_tokens: 6000, min_tokens: 500 });
    expect(merged.max_tokens_per_chunk).toBe(15000);
  });

  it('replaces helper patterns instead of concatenating', () => {
    expect(mergeConfig(DEFAULT_CONFIG, { helper_patterns: [] }).helper_patterns).toEqual([]);
    expect(
      mergeConfig(DEFAULT_CONFIG, { helper_patterns: ['fn\\d+'] }).helper_patterns
    ).toEqual(['fn\\d+']);
  });

  it('does not share arrays with the base', () => {
    const merged = mergeConfig(DEFAULT_CONFIG, {});
    expect(merged.helper_patterns).not.toBe(DEFAULT_CONFIG.helper_patterns);
  });
});

describe('Config Loading', () => {
  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('returns defaults when no config file exists', () => {
    expect(findConfigFile(TEST_DIR)).toBeNull();
    expect(loadConfig(undefined, TEST_DIR)).toEqual(DEFAULT_CONFIG);
  });

  it('finds xslt-chunk.toml in the working directory', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, 'max_tokens_per_chunk = 20000\n');

    expect(findConfigFile(TEST_DIR)).toBe(TEST_CONFIG_PATH);
    const config = loadConfig(undefined, TEST_DIR);
    expect(config.max_tokens_per_chunk).toBe(20000);
    expect(config.overlap_tokens).toBe(500);
  });

  it('loads an explicit path', () => {
    const custom = path.join(TEST_DIR, 'custom.toml');
    fs.writeFileSync(custom, "helper_patterns = []\n\n[semantic]\ntarget_tokens = 3000\n");

    const config = loadConfig(custom);

    expect(config.helper_patterns).toEqual([]);
    expect(config.semantic.target_tokens).toBe(3000);
  });

  it('throws FileNotFoundError for a missing explicit path', () => {
    const missing = path.join(TEST_DIR, 'missing.toml');
    expect(() => loadConfig(missing)).toThrow(FileNotFoundError);
  });

  it('throws ConfigError for invalid TOML', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, 'max_tokens_per_chunk = = 3\n');
    expect(() => loadConfig(TEST_CONFIG_PATH)).toThrow(ConfigError);
  });

  it('lists schema issues on the error', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, 'overlap_tokens = "lots"\n');

    try {
      loadConfig(TEST_CONFIG_PATH);
      expect.unreachable('loadConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toHaveLength(1);
        expect(error.issues[0]).toMatch(/^overlap_tokens: /);
      }
    }
  });

  it('rejects a merged config that breaks cross-field rules', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, 'overlap_tokens = 20000\n');

    try {
      loadConfig(TEST_CONFIG_PATH);
      expect.unreachable('loadConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual(['overlap_tokens: Must be less than max_tokens_per_chunk']);
      }
    }
  });
});

describe('initConfigFile', () => {
  beforeEach(() => {
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  it('writes the template into a directory', () => {
    const written = initConfigFile(TEST_DIR);

    expect(written).toBe(TEST_CONFIG_PATH);
    expect(fs.readFileSync(written, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });

  it('refuses to overwrite without force', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, '# mine\n');

    expect(() => initConfigFile(TEST_CONFIG_PATH)).toThrow(CLIError);
    expect(fs.readFileSync(TEST_CONFIG_PATH, 'utf-8')).toBe('# mine\n');
  });

  it('overwrites with force', () => {
    fs.writeFileSync(TEST_CONFIG_PATH, '# mine\n');

    initConfigFile(TEST_CONFIG_PATH, true);
    expect(fs.readFileSync(TEST_CONFIG_PATH, 'utf-8')).toBe(CONFIG_TEMPLATE);
  });
});

describe('Config output', () => {
  it('flattens nested keys', () => {
    const entries = listConfig(DEFAULT_CONFIG);

    expect(entries).toContainEqual(['max_tokens_per_chunk', 15000]);
    expect(entries).toContainEqual(['semantic.min_tokens', 1000]);
    expect(entries).toContainEqual(['helper_patterns', ['(?:vmf:)?vmf\\d+']]);
  });

  it('stringifies to TOML that loads back', () => {
    const toml = stringifyConfig(DEFAULT_CONFIG);
    expect(mergeConfig(DEFAULT_CONFIG, parseConfigToml(toml, 'output'))).toEqual(DEFAULT_CONFIG);
  });
});
