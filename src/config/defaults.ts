/**
 * Default Configuration Values
 *
 * These are used when:
 * 1. No xslt-chunk.toml exists
 * 2. The config file or the caller leaves fields out
 *
 * The loader merges user config ON TOP of these defaults.
 */

import type { ChunkerConfig, HelperPreset } from './schema.js';

/**
 * Helper template naming conventions of common generators
 */
export const HELPER_PATTERN_PRESETS: Record<HelperPreset, string> = {
  // vmf:vmf1_inputtoresult, vmf2_...
  mapforce: '(?:vmf:)?vmf\\d+',
  saxon: '(?:f:)?func\\d+',
  custom: '(?:util:)?helper[\\w_]*',
  generic: '(?:\\w+:)?(?:helper|util|fn)\\w*',
};

export const DEFAULT_HELPER_PATTERNS: readonly string[] = [HELPER_PATTERN_PRESETS.mapforce];

export const DEFAULT_CONFIG: ChunkerConfig = {
  max_tokens_per_chunk: 15000,
  overlap_tokens: 500,
  main_template_split_threshold: 10000,
  helper_patterns: [...DEFAULT_HELPER_PATTERNS],
  semantic: {
    target_tokens: 4000,
    max_tokens: 6000,
    min_tokens: 1000,
  },
};

export const CONFIG_FILE_NAME = 'xslt-chunk.toml';

/**
 * Config file template (TOML format)
 * Written by `xslt-chunk config init`
 */
export const CONFIG_TEMPLATE = `# xslt-chunk configuration
# Looked up as ./${CONFIG_FILE_NAME}, or passed with --config <path>

# Hard ceiling for any emitted chunk
max_tokens_per_chunk = ${DEFAULT_CONFIG.max_tokens_per_chunk}

# Context carried from the end of one piece into the next when a chunk is split
overlap_tokens = ${DEFAULT_CONFIG.overlap_tokens}

# Main templates above this size are split at structural boundaries
main_template_split_threshold = ${DEFAULT_CONFIG.main_template_split_threshold}

# Regular expressions naming helper templates. Remove the key for the
# mapforce default; an empty list classifies every template as main.
# Presets:
#   mapforce = '${HELPER_PATTERN_PRESETS.mapforce}'
#   saxon    = '${HELPER_PATTERN_PRESETS.saxon}'
#   custom   = '${HELPER_PATTERN_PRESETS.custom}'
#   generic  = '${HELPER_PATTERN_PRESETS.generic}'
helper_patterns = ['${HELPER_PATTERN_PRESETS.mapforce}']

[semantic]
target_tokens = ${DEFAULT_CONFIG.semantic.target_tokens}
max_tokens = ${DEFAULT_CONFIG.semantic.max_tokens}
min_tokens = ${DEFAULT_CONFIG.semantic.min_tokens}
`;
