/**
 * Analyze Command
 *
 * Chunks a stylesheet and reports on the result:
 *   xslt-chunk analyze <file>
 *   xslt-chunk analyze <file> --json
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import {
  addChunkingOptions,
  contextLogger,
  resolveCommandConfig,
  type ChunkingCommandOptions,
} from '../utils/chunking-options.js';
import {
  CHUNK_KINDS,
  analyzeChunks,
  chunkDocument,
  type TemplateListing,
} from '../../chunker/index.js';
import { formatBytes, formatNumber, formatTable, type Column } from '../../utils/index.js';

const TEMPLATE_COLUMNS: Column<TemplateListing>[] = [
  { header: 'ID', value: (t) => t.id },
  { header: 'Name', value: (t) => t.name ?? '-' },
  { header: 'Lines', value: (t) => `${t.startLine}-${t.endLine}`, align: 'right' },
  { header: 'Tokens', value: (t) => formatNumber(t.estimatedTokens), align: 'right' },
];

function row(label: string, value: string | number): string {
  return `  ${label.padEnd(22)}${chalk.cyan(typeof value === 'number' ? formatNumber(value) : value)}`;
}

export function createAnalyzeCommand(getContext: () => CommandContext): Command {
  const command = new Command('analyze')
    .argument('<file>', 'Stylesheet to analyze')
    .description('Chunk a stylesheet and report sizes, kinds and dependencies');

  return addChunkingOptions(command).action(async (file: string, cmdOptions: ChunkingCommandOptions) => {
    const ctx = getContext();
    const config = resolveCommandConfig(cmdOptions);
    const path = resolve(file);

    ctx.debug(`Analyzing ${path}`);
    const { chunks, metadata } = await chunkDocument(path, config, { logger: contextLogger(ctx) });
    const report = analyzeChunks(chunks, config.max_tokens_per_chunk);

    if (ctx.options.json) {
      console.log(JSON.stringify({ file: path, document: metadata, analysis: report }, null, 2));
      return;
    }

    ctx.log(chalk.bold(`Analysis of ${path}`));
    ctx.log('');
    ctx.log(chalk.bold('Document'));
    ctx.log(row('Size', formatBytes(metadata.sizeBytes)));
    ctx.log(row('Lines', metadata.lineCount));
    ctx.log(row('Encoding', metadata.encoding));
    ctx.log(row('Estimated tokens', metadata.estimatedTokens));
    ctx.log('');

    ctx.log(chalk.bold('Chunks'));
    ctx.log(row('Total', report.totalChunks));
    ctx.log(row('Sub-chunks', report.subChunkCount));
    ctx.log(row('Tokens', report.totalTokens));
    ctx.log(row('Average tokens', report.averageTokens));
    ctx.log(row('Min / max tokens', `${formatNumber(report.minTokens)} / ${formatNumber(report.maxTokens)}`));
    for (const kind of CHUNK_KINDS) {
      if (report.kinds[kind] > 0) {
        ctx.log(row(kind, report.kinds[kind]));
      }
    }
    ctx.log('');

    ctx.log(chalk.bold('Dependencies'));
    ctx.log(row('Total', report.dependencies.total));
    ctx.log(row('Unique', report.dependencies.unique));
    ctx.log(row('Variables', report.dependencies.byTag.var));
    ctx.log(row('Templates', report.dependencies.byTag.template));
    ctx.log(row('Functions', report.dependencies.byTag.function));
    ctx.log('');

    ctx.log(chalk.bold('Patterns'));
    ctx.log(row('Choose blocks', report.patterns.chooseBlocks));
    ctx.log(row('Variables', report.patterns.variables));
    ctx.log(row('XPath', report.patterns.xpath));

    if (report.helperTemplates.length > 0) {
      ctx.log('');
      ctx.log(chalk.bold(`Helper templates (${report.helperTemplates.length})`));
      ctx.log(formatTable(TEMPLATE_COLUMNS, report.helperTemplates));
    }
    if (report.mainTemplates.length > 0) {
      ctx.log('');
      ctx.log(chalk.bold(`Main templates (${report.mainTemplates.length})`));
      ctx.log(formatTable(TEMPLATE_COLUMNS, report.mainTemplates));
    }

    if (report.oversizedChunks.length > 0) {
      ctx.warn(
        `${report.oversizedChunks.length} chunk(s) exceed ${formatNumber(config.max_tokens_per_chunk)} tokens: ` +
          report.oversizedChunks.join(', ')
      );
    }
  });
}
