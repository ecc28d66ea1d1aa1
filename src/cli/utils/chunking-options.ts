/**
 * Chunking options shared by `chunk` and `analyze`.
 *
 * Resolution order: defaults, then the config file (`--config` or
 * ./xslt-chunk.toml), then flags.
 */

import type { Command } from 'commander';
import {
  HELPER_PATTERN_PRESETS,
  HelperPresetSchema,
  loadConfig,
  type ChunkerConfig,
} from '../../config/index.js';
import { CLIError } from '../../errors/index.js';
import type { Logger } from '../../utils/logger.js';
import type { CommandContext } from '../types.js';

/**
 * Raw option values as commander hands them over.
 */
export interface ChunkingCommandOptions {
  config?: string;
  maxTokens?: string;
  overlap?: string;
  splitThreshold?: string;
  preset?: string;
  helperPattern?: string[];
}

export function addChunkingOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Config file (default: ./xslt-chunk.toml)')
    .option('--max-tokens <n>', 'Hard ceiling for any chunk')
    .option('--overlap <n>', 'Overlap carried into the next piece of a split chunk')
    .option('--split-threshold <n>', 'Split main templates above this size')
    .option('--preset <name>', `Helper pattern preset (${HelperPresetSchema.options.join(', ')})`)
    .option('--helper-pattern <regex...>', 'Additional helper template pattern');
}

function toInteger(value: string | undefined, flag: string): number | undefined {
  if (value === undefined) return undefined;

  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new CLIError(`Invalid value for ${flag}: ${value}`, 'Expected a whole number of tokens');
  }
  return parsed;
}

/**
 * Effective configuration for a command. The chunker validates the result.
 *
 * `--preset` replaces the configured helper patterns; `--helper-pattern`
 * adds to them.
 */
export function resolveCommandConfig(
  options: ChunkingCommandOptions,
  cwd: string = process.cwd()
): ChunkerConfig {
  const config = loadConfig(options.config, cwd);

  let helperPatterns = config.helper_patterns ?? [];
  if (options.preset !== undefined) {
    const preset = HelperPresetSchema.safeParse(options.preset);
    if (!preset.success) {
      throw new CLIError(
        `Unknown preset: ${options.preset}`,
        `Available presets: ${HelperPresetSchema.options.join(', ')}`
      );
    }
    helperPatterns = [HELPER_PATTERN_PRESETS[preset.data]];
  }

  return {
    max_tokens_per_chunk: toInteger(options.maxTokens, '--max-tokens') ?? config.max_tokens_per_chunk,
    overlap_tokens: toInteger(options.overlap, '--overlap') ?? config.overlap_tokens,
    main_template_split_threshold:
      toInteger(options.splitThreshold, '--split-threshold') ?? config.main_template_split_threshold,
    helper_patterns: [...helperPatterns, ...(options.helperPattern ?? [])],
    semantic: { ...config.semantic },
  };
}

/**
 * Route chunker diagnostics through the command context.
 */
export function contextLogger(ctx: CommandContext): Logger {
  return {
    warn: (message) => ctx.warn(message),
    debug: (message) => ctx.debug(message),
  };
}
