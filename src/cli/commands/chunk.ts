/**
 * Chunk Command
 *
 * Chunks one or more stylesheets and prints the chunk table per file:
 *   xslt-chunk chunk <files...>
 *   xslt-chunk chunk mapping.xslt --max-tokens 8000 --json
 *
 * A file that cannot be read is reported and the remaining files are
 * still chunked; the exit code is that of the first failure.
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import type { Ora } from 'ora';

import type { CommandContext } from '../types.js';
import {
  addChunkingOptions,
  contextLogger,
  resolveCommandConfig,
  type ChunkingCommandOptions,
} from '../utils/chunking-options.js';
import { chunkDocuments, summarizeChunks, type Chunk } from '../../chunker/index.js';
import { formatNumber, formatTable, type Column } from '../../utils/index.js';
import { formatFileFailure } from '../../errors/index.js';

const CHUNK_COLUMNS: Column<Chunk>[] = [
  { header: 'ID', value: (c) => c.id },
  { header: 'Kind', value: (c) => c.kind },
  { header: 'Name', value: (c) => c.name ?? '-' },
  { header: 'Lines', value: (c) => `${c.startLine}-${c.endLine}`, align: 'right' },
  { header: 'Tokens', value: (c) => formatNumber(c.estimatedTokens), align: 'right' },
  { header: 'Deps', value: (c) => c.dependencies.length, align: 'right' },
];

/**
 * Create the chunk command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createChunkCommand(getContext: () => CommandContext): Command {
  const command = new Command('chunk')
    .argument('<files...>', 'Stylesheets to chunk')
    .description('Split stylesheets into token-bounded chunks');

  return addChunkingOptions(command).action(
    async (files: string[], cmdOptions: ChunkingCommandOptions) => {
      const ctx = getContext();
      const config = resolveCommandConfig(cmdOptions);
      const paths = files.map((file) => resolve(file));

      ctx.debug(`Max tokens: ${config.max_tokens_per_chunk}, overlap: ${config.overlap_tokens}`);
      ctx.debug(`Helper patterns: ${(config.helper_patterns ?? []).join(', ') || '(none)'}`);

      let spinner: Ora | null = null;
      if (!ctx.options.json && process.stdout.isTTY) {
        const ora = (await import('ora')).default;
        spinner = ora(`Chunking ${paths.length} file(s)...`).start();
      }

      const result = await chunkDocuments(paths, config, { logger: contextLogger(ctx) });
      spinner?.stop();

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              files: result.files.map((file) => ({
                file: file.filePath,
                success: file.success,
                ...(file.error !== undefined && { error: file.error, code: file.errorCode }),
                chunks: summarizeChunks(file.chunks),
              })),
              success_count: result.successCount,
              failure_count: result.failureCount,
              total_chunks: result.totalChunks,
            },
            null,
            2
          )
        );
      } else {
        for (const file of result.files) {
          if (!file.success) {
            ctx.error(formatFileFailure(file));
            continue;
          }

          ctx.log(chalk.bold(file.filePath));
          if (file.chunks.length === 0) {
            ctx.log(chalk.dim('  (empty document)'));
          } else {
            ctx.log(formatTable(CHUNK_COLUMNS, file.chunks));
          }
          ctx.log('');
        }

        ctx.log(
          `${chalk.green('✓')} ${formatNumber(result.totalChunks)} chunks from ` +
            `${result.successCount} of ${result.files.length} file(s)`
        );
      }

      const failed = result.files.find((file) => !file.success);
      if (failed) {
        process.exitCode = failed.errorCode ?? 1;
      }
    }
  );
}
