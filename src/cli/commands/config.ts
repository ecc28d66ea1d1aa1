/**
 * Config Command
 *
 * Inspects and creates xslt-chunk.toml:
 *   xslt-chunk config show [-c <path>]   - Show the effective configuration
 *   xslt-chunk config init [path]        - Write a commented default file
 */

import { Command } from 'commander';
import { resolve } from 'node:path';
import chalk from 'chalk';
import {
  findConfigFile,
  initConfigFile,
  listConfig,
  loadConfig,
  stringifyConfig,
} from '../../config/index.js';
import type { CommandContext } from '../types.js';

function formatValue(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((v) => JSON.stringify(v)).join(', ')}]`;
  }
  return String(value);
}

/**
 * Create the config command with its subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Show or create the configuration file');

  configCmd
    .command('show')
    .description('Show the effective configuration')
    .option('-c, --config <path>', 'Config file (default: ./xslt-chunk.toml)')
    .option('--toml', 'Print as TOML', false)
    .action((options: { config?: string; toml: boolean }) => {
      const ctx = getContext();
      const explicit = options.config !== undefined ? resolve(options.config) : undefined;
      const source = explicit ?? findConfigFile();
      const config = loadConfig(explicit);

      if (ctx.options.json) {
        console.log(JSON.stringify({ source, config }, null, 2));
        return;
      }

      if (options.toml) {
        console.log(stringifyConfig(config));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');
      for (const [key, value] of listConfig(config)) {
        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }
      ctx.log('');
      ctx.log(chalk.dim(`Config file: ${source ?? '(none, using defaults)'}`));
    });

  configCmd
    .command('init')
    .argument('[path]', 'File or directory to write to', '.')
    .description('Write a commented default configuration file')
    .option('-f, --force', 'Overwrite an existing file', false)
    .action((target: string, options: { force: boolean }) => {
      const ctx = getContext();
      const file = initConfigFile(resolve(target), options.force);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: file }));
      } else {
        ctx.log(`${chalk.green('✓')} Created ${chalk.cyan(file)}`);
      }
    });

  return configCmd;
}
