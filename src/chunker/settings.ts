/**
 * Chunker Settings
 *
 * Validated, frozen configuration for one chunking run, with helper
 * patterns compiled. Resolution happens before any line is scanned, so an
 * invalid configuration never produces partial output.
 */

import {
  DEFAULT_CONFIG,
  PartialChunkerConfigSchema,
  formatIssues,
  mergeConfig,
  validateConfig,
  type ChunkerConfig,
  type PartialChunkerConfig,
} from '../config/index.js';
import { ConfigError } from '../errors/index.js';
import { estimateTokens as defaultEstimator, type TokenEstimator } from '../tokens/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { compileHelperPatterns } from './classifier.js';
import type { ChunkerOptions } from './types.js';

export interface SemanticSettings {
  readonly targetTokens: number;
  readonly maxTokens: number;
  readonly minTokens: number;
}

export interface ChunkerSettings {
  readonly maxTokensPerChunk: number;
  readonly overlapTokens: number;
  readonly splitThreshold: number;
  readonly helperPatterns: readonly RegExp[];
  readonly semantic: SemanticSettings;
  /** The validated source config */
  readonly config: Readonly<ChunkerConfig>;
}

/**
 * Everything a decomposition step needs: settings plus injected
 * capabilities.
 */
export interface ChunkingContext {
  settings: ChunkerSettings;
  estimateTokens: TokenEstimator;
  logger: Logger;
}

function compile(sources: readonly string[]): RegExp[] {
  const compiled: RegExp[] = [];
  const issues: string[] = [];

  sources.forEach((source, index) => {
    try {
      compiled.push(...compileHelperPatterns([source]));
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;
      issues.push(`helper_patterns.${index}: ${error.message}`);
    }
  });

  if (issues.length > 0) {
    throw new ConfigError(
      'Invalid helper pattern',
      'Helper patterns are JavaScript regular expressions; escape backslashes in TOML basic strings',
      issues
    );
  }
  return compiled;
}

/**
 * Validate a (possibly sparse) config and resolve it into settings.
 *
 * Missing fields take their defaults; an omitted `helper_patterns` means
 * the mapforce preset, while `[]` means no template is a helper.
 *
 * @throws ConfigError for schema violations or an invalid helper pattern
 */
export function resolveChunkerSettings(config: PartialChunkerConfig = {}): ChunkerSettings {
  const partial = PartialChunkerConfigSchema.safeParse(config);
  if (!partial.success) {
    throw new ConfigError('Invalid configuration', undefined, formatIssues(partial.error));
  }

  const resolved = validateConfig(mergeConfig(DEFAULT_CONFIG, partial.data));
  const helperPatterns = compile(resolved.helper_patterns ?? []);

  return Object.freeze({
    maxTokensPerChunk: resolved.max_tokens_per_chunk,
    overlapTokens: resolved.overlap_tokens,
    splitThreshold: resolved.main_template_split_threshold,
    helperPatterns: Object.freeze(helperPatterns),
    semantic: Object.freeze({
      targetTokens: resolved.semantic.target_tokens,
      maxTokens: resolved.semantic.max_tokens,
      minTokens: resolved.semantic.min_tokens,
    }),
    config: Object.freeze(resolved),
  });
}

/**
 * Fill in default capabilities.
 */
export function createChunkingContext(
  settings: ChunkerSettings,
  options: ChunkerOptions = {}
): ChunkingContext {
  return {
    settings,
    estimateTokens: options.estimateTokens ?? defaultEstimator,
    logger: options.logger ?? silentLogger,
  };
}
