/**
 * Error handling module
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid helper pattern', 'Check helper_patterns');
 */

// Error types
export { CLIError, FileNotFoundError, ConfigError } from './types.js';

// Error handling utilities
export {
  formatError,
  toErrorOutput,
  describeFailure,
  formatFileFailure,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
  type FileFailure,
} from './handler.js';
