/**
 * Logger interface for library code
 *
 * The chunking engine never writes to the console directly. It accepts a
 * Logger through ChunkerOptions; the CLI routes it to its CommandContext
 * and tests pass vi.fn() mocks or silentLogger.
 */

export interface Logger {
  /** Recoverable problems such as an unclosed template */
  warn: (message: string) => void;
  /** Progress detail, only shown with --verbose */
  debug?: (message: string) => void;
}

/**
 * Logger that writes to stderr, keeping stdout free for chunk output.
 */
export const consoleLogger: Logger = {
  warn: (message: string) => console.error(message),
  debug: (message: string) => console.error(message),
};

/**
 * Default for library calls that don't pass a logger.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};
