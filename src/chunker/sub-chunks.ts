/**
 * Sub-chunk materialization
 *
 * Both splitters first plan pieces as index ranges over the parent's
 * lines, then this module turns the plan into chunks with lineage
 * metadata.
 */

import type { Chunk, SemanticBoundary, SplitStrategy } from './types.js';
import type { ChunkingContext } from './settings.js';

/**
 * One planned piece. Indices are 0-based into the parent's lines,
 * inclusive. Lines [start, coreStart) repeat the end of the previous
 * piece; the core spans of consecutive pieces tile the parent exactly.
 */
export interface PiecePlan {
  start: number;
  coreStart: number;
  end: number;
  strategy: SplitStrategy;
}

export interface MaterializeOptions {
  /** Name of the i-th sub-chunk */
  name: (index: number) => string | null;
  /** Semantic boundaries to attach to the pieces whose core contains them */
  boundaries?: readonly SemanticBoundary[];
}

export function formatSubChunkId(parentId: string, index: number): string {
  return `${parentId}_sub_${String(index).padStart(2, '0')}`;
}

/**
 * Build sub-chunks from a plan. A plan with fewer than two pieces leaves
 * the parent as it is.
 */
export function materializeSubChunks(
  parent: Chunk,
  plans: readonly PiecePlan[],
  context: ChunkingContext,
  options: MaterializeOptions
): Chunk[] {
  if (plans.length < 2) {
    return [parent];
  }

  return plans.map((plan, index) => {
    const lines = parent.lines.slice(plan.start, plan.end + 1);
    const startLine = parent.startLine + plan.start;
    const coreStartLine = parent.startLine + plan.coreStart;
    const endLine = parent.startLine + plan.end;

    const chunk: Chunk = {
      id: formatSubChunkId(parent.id, index),
      kind: parent.kind,
      name: options.name(index),
      startLine,
      endLine,
      lines,
      estimatedTokens: context.estimateTokens(lines.join('\n')),
      dependencies: [...parent.dependencies],
      metadata: {
        ...parent.metadata,
        isSubChunk: true,
        parentChunkId: parent.id,
        subChunkIndex: index,
        coreStartLine,
        overlapLineCount: plan.coreStart - plan.start,
        splitStrategy: plan.strategy,
      },
    };

    if (options.boundaries) {
      chunk.metadata.semanticBoundaries = options.boundaries.filter(
        (b) => b.line >= coreStartLine && b.line <= endLine
      );
    }

    return chunk;
  });
}
