/**
 * Chunker
 *
 * Main orchestration for the stylesheet chunking pipeline.
 *
 * Architecture:
 * 1. Lines → boundary scan (templates, variables, imports, choose blocks)
 * 2. Boundaries → structural chunks covering every line exactly once
 * 3. Oversized chunks are decomposed:
 *    - Main templates above the split threshold → semantic sub-chunks
 *    - Anything else above max_tokens_per_chunk → generic sliding window
 * 4. Every final chunk is enriched with dependencies and content flags
 *
 * chunkLines() is pure and synchronous. chunkDocument() and
 * chunkDocuments() add file reading.
 */

import { readDocument, type DocumentMetadata } from '../document/index.js';
import type { PartialChunkerConfig } from '../config/index.js';
import { describeFailure, formatFileFailure } from '../errors/index.js';
import { buildStructuralChunks } from './builder.js';
import { enrichChunk } from './enricher.js';
import { scanBoundaries } from './scanner.js';
import { decomposeMainTemplate } from './semantic.js';
import {
  createChunkingContext,
  resolveChunkerSettings,
  type ChunkerSettings,
  type ChunkingContext,
} from './settings.js';
import { splitChunk } from './splitter.js';
import type {
  BatchChunkResult,
  Chunk,
  ChunkerOptions,
  ChunkSummary,
  DocumentChunkResult,
} from './types.js';

/**
 * Chunks of one document plus what the reader learned about the file.
 */
export interface ChunkedDocument {
  path: string;
  chunks: Chunk[];
  metadata: DocumentMetadata;
}

/**
 * Replace an oversized chunk with its sub-chunks; anything else passes
 * through unchanged.
 */
export function decomposeChunk(chunk: Chunk, context: ChunkingContext): Chunk[] {
  const { maxTokensPerChunk, splitThreshold } = context.settings;

  if (chunk.kind === 'main_template' && chunk.estimatedTokens > splitThreshold) {
    return decomposeMainTemplate(chunk, context);
  }

  if (chunk.estimatedTokens > maxTokensPerChunk) {
    return splitChunk(chunk, context);
  }

  return [chunk];
}

/**
 * Chunk a document given as lines (no terminators).
 *
 * A document with only blank lines yields no chunks.
 *
 * @param lines - Line i of the document is lines[i - 1]
 * @param settings - From resolveChunkerSettings()
 * @param options - Injected estimator and logger
 */
export function chunkLines(
  lines: readonly string[],
  settings: ChunkerSettings,
  options: ChunkerOptions = {}
): Chunk[] {
  const context = createChunkingContext(settings, options);

  if (lines.every((line) => line.trim() === '')) {
    context.logger.debug?.('Document is empty, nothing to chunk');
    return [];
  }

  const boundaries = scanBoundaries(lines, settings.helperPatterns);
  context.logger.debug?.(`Found ${boundaries.length} boundaries in ${lines.length} lines`);

  const structural = buildStructuralChunks(lines, boundaries, context.estimateTokens, context.logger);
  context.logger.debug?.(`Built ${structural.length} structural chunks`);

  const chunks = structural.flatMap((chunk) => decomposeChunk(chunk, context));
  for (const chunk of chunks) {
    enrichChunk(chunk);
  }

  context.logger.debug?.(`Produced ${chunks.length} chunks`);
  return chunks;
}

/**
 * Read and chunk one file.
 *
 * The configuration is validated before the file is touched.
 *
 * @throws ConfigError for an invalid configuration
 * @throws FileNotFoundError when the file does not exist
 */
export async function chunkDocument(
  path: string,
  config: PartialChunkerConfig = {},
  options: ChunkerOptions = {}
): Promise<ChunkedDocument> {
  const settings = resolveChunkerSettings(config);
  const document = await readDocument(path);

  return {
    path,
    chunks: chunkLines(document.lines, settings, options),
    metadata: document.metadata,
  };
}

async function chunkDocumentWithResult(
  path: string,
  settings: ChunkerSettings,
  options: ChunkerOptions
): Promise<DocumentChunkResult> {
  try {
    const document = await readDocument(path);
    return {
      filePath: path,
      success: true,
      chunks: chunkLines(document.lines, settings, options),
      document: document.metadata,
    };
  } catch (error) {
    return {
      filePath: path,
      success: false,
      chunks: [],
      ...describeFailure(error),
    };
  }
}

/**
 * Chunk several files with aggregated result reporting.
 *
 * A file that fails to read is reported in its own result and does not
 * stop the batch. An invalid configuration still throws, before any file
 * is read.
 */
export async function chunkDocuments(
  paths: readonly string[],
  config: PartialChunkerConfig = {},
  options: ChunkerOptions = {}
): Promise<BatchChunkResult> {
  const settings = resolveChunkerSettings(config);
  const files: DocumentChunkResult[] = [];
  const errors: string[] = [];
  let successCount = 0;
  let failureCount = 0;

  for (const path of paths) {
    const result = await chunkDocumentWithResult(path, settings, options);
    files.push(result);

    if (result.success) {
      successCount++;
    } else {
      failureCount++;
      errors.push(formatFileFailure(result));
    }
  }

  return {
    files,
    successCount,
    failureCount,
    totalChunks: files.reduce((sum, r) => sum + r.chunks.length, 0),
    errors,
  };
}

/**
 * Flatten chunks for serialization.
 */
export function summarizeChunks(chunks: readonly Chunk[]): ChunkSummary[] {
  return chunks.map((chunk) => ({
    id: chunk.id,
    kind: chunk.kind,
    name: chunk.name,
    start_line: chunk.startLine,
    end_line: chunk.endLine,
    line_count: chunk.lines.length,
    estimated_tokens: chunk.estimatedTokens,
    dependencies: [...chunk.dependencies],
  }));
}
