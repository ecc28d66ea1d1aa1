/**
 * xslt-chunker - Library Entry Point
 *
 * Splits large XSLT stylesheets into chunks that respect template
 * boundaries and stay under a token ceiling. The CLI (`xslt-chunk`) wraps
 * the same functions.
 *
 * @example Chunk a file
 * ```typescript
 * import { chunkDocument, summarizeChunks } from 'xslt-chunker';
 *
 * const { chunks } = await chunkDocument('mapping.xslt', { max_tokens_per_chunk: 8000 });
 * console.log(summarizeChunks(chunks));
 * ```
 *
 * @example Chunk lines already in memory
 * ```typescript
 * import { chunkLines, resolveChunkerSettings } from 'xslt-chunker';
 *
 * const settings = resolveChunkerSettings({ helper_patterns: ['(?:f:)?func\\d+'] });
 * const chunks = chunkLines(source.split('\n'), settings, { logger: console });
 * ```
 *
 * @packageDocumentation
 */

// Pipeline and stages
export {
  chunkLines,
  chunkDocument,
  chunkDocuments,
  decomposeChunk,
  summarizeChunks,
  resolveChunkerSettings,
  createChunkingContext,
  scanBoundaries,
  classifyTemplate,
  compileHelperPatterns,
  buildStructuralChunks,
  splitChunk,
  decomposeMainTemplate,
  findSemanticBoundaries,
  enrichChunk,
  extractDependencies,
  analyzeChunks,
  CHUNK_KINDS,
} from './chunker/index.js';

export type {
  Boundary,
  Chunk,
  ChunkKind,
  ChunkMetadata,
  ChunkSummary,
  ChunkerOptions,
  ChunkedDocument,
  ChunkerSettings,
  ChunkAnalysis,
  BatchChunkResult,
  DocumentChunkResult,
  SemanticBoundary,
  SplitStrategy,
  TemplateKind,
} from './chunker/index.js';

// Token estimation
export {
  estimateTokens,
  createTokenEstimator,
  ESTIMATION_METHODS,
  type TokenEstimator,
  type EstimationMethod,
} from './tokens/index.js';

// Document reading
export {
  readDocument,
  type XsltDocument,
  type DocumentMetadata,
  type DocumentEncoding,
} from './document/index.js';

// Configuration
export {
  DEFAULT_CONFIG,
  HELPER_PATTERN_PRESETS,
  ChunkerConfigSchema,
  loadConfig,
  type ChunkerConfig,
  type PartialChunkerConfig,
  type HelperPreset,
} from './config/index.js';

// Errors and logging
export { CLIError, FileNotFoundError, ConfigError, formatError } from './errors/index.js';
export { consoleLogger, silentLogger, type Logger } from './utils/index.js';
