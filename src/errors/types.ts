/**
 * Error type definitions for the xslt-chunk CLI and library
 *
 * Every error the chunking engine surfaces is one of these classes:
 * - FileNotFoundError: the upstream document (or an explicit config file) is missing
 * - ConfigError: a configuration value or helper pattern is invalid
 *
 * Malformed markup is never an error; the engine tolerates it.
 */

/**
 * Base class for all CLI errors.
 *
 * hint: tells the user how to fix the problem
 * code: process exit code, so scripts can branch on the failure kind
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a document or config file doesn't exist.
 *
 * Exit code 3: File not found (following common Unix conventions)
 */
export class FileNotFoundError extends CLIError {
  /** The path that could not be found */
  public readonly path: string;

  constructor(path: string) {
    super(
      `Path does not exist: ${path}`,
      'Check the path and try again',
      3
    );
    this.name = 'FileNotFoundError';
    this.path = path;
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax in xslt-chunk.toml
 * - A value outside its allowed range
 * - A helper pattern that is not a valid regular expression
 *
 * Raised before any scanning begins. Exit code 2.
 */
export class ConfigError extends CLIError {
  /** Individual validation issues, one per offending field */
  public readonly issues: string[];

  constructor(message: string, hint?: string, issues: string[] = []) {
    super(
      message,
      hint ?? 'Run: xslt-chunk config show  to see the effective configuration',
      2
    );
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
