/**
 * Structural Chunk Builder
 *
 * Turns the boundary stream into a contiguous, non-overlapping partition
 * of the document. Templates become chunks of their own kind; everything
 * between templates becomes `unknown` filler.
 *
 * Markup is not assumed to be well formed:
 * - a template that opens inside another flushes the outer template's
 *   lines so far as a partial chunk of the outer template
 * - a closing tag with nothing open is ordinary content
 * - a template still open at end of input is closed at the last line
 */

import type { TokenEstimator } from '../tokens/index.js';
import type { Logger } from '../utils/logger.js';
import type { Boundary, Chunk, ChunkKind, ChunkMetadata, TemplateKind } from './types.js';

interface OpenTemplate {
  kind: TemplateKind;
  name: string | null;
  line: number;
}

export function formatChunkId(index: number): string {
  return `chunk_${String(index).padStart(3, '0')}`;
}

/**
 * Create a chunk over lines [startLine, endLine] (1-based, inclusive).
 */
export function createChunk(
  lines: readonly string[],
  id: string,
  kind: ChunkKind,
  name: string | null,
  startLine: number,
  endLine: number,
  estimateTokens: TokenEstimator,
  metadata: ChunkMetadata = {}
): Chunk {
  const chunkLines = lines.slice(startLine - 1, endLine);
  return {
    id,
    kind,
    name,
    startLine,
    endLine,
    lines: chunkLines,
    estimatedTokens: estimateTokens(chunkLines.join('\n')),
    dependencies: [],
    metadata,
  };
}

/**
 * Build the top-level chunks. Coverage is exact: every line 1..N lands in
 * exactly one chunk, in order.
 */
export function buildStructuralChunks(
  lines: readonly string[],
  boundaries: readonly Boundary[],
  estimateTokens: TokenEstimator,
  logger: Logger
): Chunk[] {
  const chunks: Chunk[] = [];
  const open: OpenTemplate[] = [];
  // First line not yet assigned to a chunk
  let cursor = 1;

  const emit = (
    endLine: number,
    kind: ChunkKind,
    name: string | null,
    metadata?: ChunkMetadata
  ): void => {
    if (endLine >= cursor) {
      chunks.push(
        createChunk(lines, formatChunkId(chunks.length), kind, name, cursor, endLine, estimateTokens, metadata)
      );
      cursor = endLine + 1;
    }
  };

  const emitPending = (endLine: number): void => {
    const innermost = open.at(-1);
    if (innermost) {
      emit(endLine, innermost.kind, innermost.name);
    } else {
      emit(endLine, 'unknown', null);
    }
  };

  for (const boundary of boundaries) {
    if (boundary.kind === 'template_start') {
      emitPending(boundary.line - 1);

      if (boundary.closesOnSameLine) {
        emit(boundary.line, boundary.templateKind, boundary.name);
      } else {
        open.push({ kind: boundary.templateKind, name: boundary.name, line: boundary.line });
      }
    } else if (boundary.kind === 'template_end') {
      const closing = open.pop();
      if (closing) {
        emit(boundary.line, closing.kind, closing.name);
      }
    }
  }

  const unclosed = open.at(-1);
  if (unclosed) {
    logger.warn(
      `Template ${unclosed.name ?? '(unnamed)'} opened at line ${unclosed.line} is never closed; ` +
        `closing it at line ${lines.length}`
    );
    emit(lines.length, unclosed.kind, unclosed.name, { implicitlyClosed: true });
  } else {
    emit(lines.length, 'unknown', null);
  }

  return chunks;
}
