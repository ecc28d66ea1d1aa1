#!/usr/bin/env node
/**
 * xslt-chunk CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAnalyzeCommand } from './commands/analyze.js';
import { createChunkCommand } from './commands/chunk.js';
import { createConfigCommand } from './commands/config.js';
import { handleError, createGlobalErrorHandler, CLIError } from '../errors/index.js';

// Same relative location from src/cli and dist/cli
const PackageJsonSchema = z.object({ version: z.string() });
const { version: VERSION } = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
);

const program = new Command();

program
  .name('xslt-chunk')
  .description('Structure-aware chunking of XSLT stylesheets for LLM context windows')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('xslt-chunk chunk mapping.xslt')}                  Chunk a stylesheet
  ${chalk.cyan('xslt-chunk chunk *.xslt --max-tokens 8000')}      Chunk several with a smaller ceiling
  ${chalk.cyan('xslt-chunk analyze mapping.xslt --preset saxon')} Report on the chunks
  ${chalk.cyan('xslt-chunk config init')}                         Write xslt-chunk.toml
  ${chalk.cyan('xslt-chunk config show')}                         Show the effective configuration
`);

/**
 * Create a command context with logging utilities.
 * stdout carries results only; diagnostics go to stderr.
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.error(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.error(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

program.addCommand(createChunkCommand(() => createContext(getGlobalOptions())));
program.addCommand(createAnalyzeCommand(() => createContext(getGlobalOptions())));
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0] ?? ''}`,
    'Run: xslt-chunk --help  to see available commands'
  );
});

async function main(): Promise<void> {
  const globalHandler = createGlobalErrorHandler(getGlobalOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getGlobalOptions());
  }
}

void main();
