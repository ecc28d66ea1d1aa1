/**
 * Utilities Module
 *
 * Shared utility functions used across the codebase.
 */

export { type Logger, consoleLogger, silentLogger } from './logger.js';

// Table formatting for CLI output
export { formatTable, stripAnsi, type Column, type Alignment } from './table.js';

export { formatBytes, formatNumber } from './format.js';
