/**
 * Chunker Module
 *
 * Structural-boundary-aware chunking of XSLT stylesheets.
 */

// Types
export type {
  Boundary,
  TemplateStartBoundary,
  TemplateEndBoundary,
  VariableBoundary,
  ImportBoundary,
  ChooseStartBoundary,
  ChooseEndBoundary,
  BatchChunkResult,
  Chunk,
  ChunkKind,
  ChunkMetadata,
  ChunkSummary,
  ChunkerOptions,
  DocumentChunkResult,
  SemanticBoundary,
  SemanticBoundaryKind,
  SplitStrategy,
  TemplateKind,
} from './types.js';
export { CHUNK_KINDS } from './types.js';

// Pipeline
export {
  chunkLines,
  chunkDocument,
  chunkDocuments,
  decomposeChunk,
  summarizeChunks,
  type ChunkedDocument,
} from './chunker.js';

// Settings
export {
  resolveChunkerSettings,
  createChunkingContext,
  type ChunkerSettings,
  type ChunkingContext,
  type SemanticSettings,
} from './settings.js';

// Stages
export { scanBoundaries, scanLine, extractTemplateName } from './scanner.js';
export { classifyTemplate, compileHelperPatterns } from './classifier.js';
export { buildStructuralChunks } from './builder.js';
export { splitChunk, planGenericPieces } from './splitter.js';
export { decomposeMainTemplate, findSemanticBoundaries } from './semantic.js';
export { enrichChunk, extractDependencies, complexityScore } from './enricher.js';

// Analysis
export {
  analyzeChunks,
  type ChunkAnalysis,
  type TemplateListing,
  type DependencyTag,
} from './analysis.js';
