import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest';
import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Command } from 'commander';
import {
  addChunkingOptions,
  contextLogger,
  resolveCommandConfig,
} from '../chunking-options.js';
import { HELPER_PATTERN_PRESETS } from '../../../config/index.js';
import { CLIError, FileNotFoundError } from '../../../errors/index.js';
import type { CommandContext } from '../../types.js';

describe('chunking options', () => {
  const testDir = join(tmpdir(), 'xslt-chunk-options-' + Date.now());
  const emptyDir = join(testDir, 'empty');
  const configPath = join(testDir, 'custom.toml');

  beforeAll(() => {
    mkdirSync(emptyDir, { recursive: true });
    writeFileSync(
      configPath,
      ['max_tokens_per_chunk = 8000', "helper_patterns = ['util:\\w+']", '', '[semantic]', 'target_tokens = 3000'].join('\n')
    );
  });

  afterAll(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe('addChunkingOptions', () => {
    it('parses every flag', () => {
      const command = addChunkingOptions(new Command('chunk')).exitOverride();
      command.parse(
        ['--max-tokens', '9000', '--overlap', '100', '--preset', 'saxon', '--helper-pattern', 'a', 'b'],
        { from: 'user' }
      );

      expect(command.opts()).toEqual({
        maxTokens: '9000',
        overlap: '100',
        preset: 'saxon',
        helperPattern: ['a', 'b'],
      });
    });
  });

  describe('resolveCommandConfig', () => {
    it('uses defaults without a config file', () => {
      const config = resolveCommandConfig({}, emptyDir);

      expect(config.max_tokens_per_chunk).toBe(15000);
      expect(config.helper_patterns).toEqual([HELPER_PATTERN_PRESETS.mapforce]);
    });

    it('layers flags over the config file', () => {
      const config = resolveCommandConfig({ config: configPath, overlap: '250', helperPattern: ['x\\d'] }, emptyDir);

      expect(config).toEqual({
        max_tokens_per_chunk: 8000,
        overlap_tokens: 250,
        main_template_split_threshold: 10000,
        helper_patterns: ['util:\\w+', 'x\\d'],
        semantic: { target_tokens: 3000, max_tokens: 6000, min_tokens: 1000 },
      });
    });

    it('replaces patterns with a preset', () => {
      const config = resolveCommandConfig({ config: configPath, preset: 'saxon' }, emptyDir);

      expect(config.helper_patterns).toEqual([HELPER_PATTERN_PRESETS.saxon]);
    });

    it('rejects an unknown preset', () => {
      expect(() => resolveCommandConfig({ preset: 'xalan' }, emptyDir)).toThrow(CLIError);
      expect(() => resolveCommandConfig({ preset: 'xalan' }, emptyDir)).toThrow('Unknown preset: xalan');
    });

    it('rejects a non-numeric token count', () => {
      expect(() => resolveCommandConfig({ maxTokens: 'lots' }, emptyDir)).toThrow(
        'Invalid value for --max-tokens: lots'
      );
    });

    it('fails for a missing explicit config file', () => {
      expect(() => resolveCommandConfig({ config: join(testDir, 'missing.toml') }, emptyDir)).toThrow(
        FileNotFoundError
      );
    });
  });

  describe('contextLogger', () => {
    it('forwards to the command context', () => {
      const ctx: CommandContext = {
        options: { verbose: true, json: false },
        log: vi.fn(),
        debug: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
      };
      const logger = contextLogger(ctx);

      logger.warn('careful');
      logger.debug?.('detail');

      expect(ctx.warn).toHaveBeenCalledWith('careful');
      expect(ctx.debug).toHaveBeenCalledWith('detail');
    });
  });
});
