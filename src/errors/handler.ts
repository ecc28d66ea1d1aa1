/**
 * Error handler for CLI error formatting and display
 *
 * Every failure is first reduced to an ErrorOutput record, then rendered
 * as coloured text or JSON. Per-file failures inside a batch are rendered
 * as one `path: message` line so a batch can keep going.
 */

import chalk from 'chalk';
import { CLIError, ConfigError, FileNotFoundError } from './types.js';

/**
 * Options for error handling behavior
 */
export interface ErrorHandlerOptions {
  /** Show full stack traces */
  verbose?: boolean;
  /** Output as JSON instead of formatted text */
  json?: boolean;
}

/**
 * Structured error for JSON output
 */
export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  /** Missing document or config file */
  path?: string;
  /** One entry per invalid configuration field */
  issues?: string[];
  stack?: string;
}

/**
 * A file that failed inside a batch, as recorded in its chunk result.
 */
export interface FileFailure {
  filePath: string;
  error?: string;
  errorCode?: number;
}

/**
 * Reduce any thrown value to the fields we report.
 */
export function toErrorOutput(error: unknown, verbose = false): ErrorOutput {
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      path: error instanceof FileNotFoundError ? error.path : undefined,
      issues: error instanceof ConfigError && error.issues.length > 0 ? error.issues : undefined,
      stack: verbose ? error.stack : undefined,
    };
  }

  // Anything else is a bug, not a user mistake
  const stack = error instanceof Error ? error.stack : undefined;
  return {
    error: error instanceof Error ? error.message : String(error),
    code: 1,
    hint: verbose ? undefined : 'Run with --verbose for more details',
    stack: verbose ? stack : undefined,
  };
}

/**
 * Format an error for display.
 *
 * Kept separate from handleError so formatting can be tested without
 * process.exit.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  const lines = [chalk.red('Error: ') + output.error];
  for (const issue of output.issues ?? []) {
    lines.push(chalk.dim('  - ') + issue);
  }
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

/**
 * Message and exit code recorded for a file that failed in a batch.
 */
export function describeFailure(error: unknown): { error: string; errorCode: number } {
  const output = toErrorOutput(error);
  return { error: output.error, errorCode: output.code };
}

/**
 * One-line report of a failed file.
 */
export function formatFileFailure(failure: FileFailure): string {
  return `${failure.filePath}: ${failure.error ?? 'unknown error'}`;
}

/**
 * Get the exit code for an error.
 *
 * CLIError has a specific code, everything else is 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Format the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  // stdout is reserved for chunk output
  console.error(formatError(error, options));

  process.exit(getExitCode(error));
}

/**
 * Create a handler for process-level 'uncaughtException' and
 * 'unhandledRejection' events.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptions = {}
): (error: unknown) => never {
  return (error: unknown) => handleError(error, options);
}
