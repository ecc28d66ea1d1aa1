/**
 * Test Utilities Module
 *
 * Shared helpers for chunker tests: a deterministic estimator, a mock
 * logger and builders for stylesheet text.
 *
 * @example
 * ```typescript
 * import { lineEstimator, stylesheet, template } from '../../test-utils/index.js';
 *
 * const lines = stylesheet(template('match="/"', filler(20)));
 * const chunks = chunkLines(lines, settings, { estimateTokens: lineEstimator(100) });
 * ```
 */

export { lineEstimator, createMockLogger, type MockLogger } from './mocks.js';
export { filler, template, stylesheet, forEachBlock } from './stylesheets.js';
