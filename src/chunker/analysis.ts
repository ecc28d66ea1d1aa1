/**
 * Chunk Analysis
 *
 * Aggregate report over a chunk list, as printed by `xslt-chunk analyze`.
 */

import type { Chunk, ChunkKind } from './types.js';

export interface TemplateListing {
  id: string;
  name: string | null;
  startLine: number;
  endLine: number;
  estimatedTokens: number;
}

export type DependencyTag = 'var' | 'template' | 'function';

export interface ChunkAnalysis {
  totalChunks: number;
  /** Lines across all chunks (overlap lines count once per chunk) */
  totalLines: number;
  totalTokens: number;
  /** Floored mean, 0 for no chunks */
  averageTokens: number;
  minTokens: number;
  maxTokens: number;
  kinds: Record<ChunkKind, number>;
  helperTemplates: TemplateListing[];
  mainTemplates: TemplateListing[];
  dependencies: {
    /** Sum of per-chunk dependency counts */
    total: number;
    /** Distinct dependencies across the document */
    unique: number;
    /** Distinct dependencies per tag */
    byTag: Record<DependencyTag, number>;
  };
  /** Number of chunks with each content flag set */
  patterns: {
    chooseBlocks: number;
    variables: number;
    xpath: number;
  };
  /** Chunks above the ceiling (only possible for single huge lines) */
  oversizedChunks: string[];
  subChunkCount: number;
}

function listing(chunk: Chunk): TemplateListing {
  return {
    id: chunk.id,
    name: chunk.name,
    startLine: chunk.startLine,
    endLine: chunk.endLine,
    estimatedTokens: chunk.estimatedTokens,
  };
}

function tagOf(dependency: string): DependencyTag | null {
  const tag = dependency.slice(0, dependency.indexOf(':'));
  return tag === 'var' || tag === 'template' || tag === 'function' ? tag : null;
}

export function analyzeChunks(chunks: readonly Chunk[], maxTokensPerChunk: number): ChunkAnalysis {
  const kinds: Record<ChunkKind, number> = {
    helper_template: 0,
    main_template: 0,
    variable_section: 0,
    import_section: 0,
    namespace_section: 0,
    choose_block: 0,
    unknown: 0,
  };
  const unique = new Set<string>();
  const tokens = chunks.map((chunk) => chunk.estimatedTokens);
  const totalTokens = tokens.reduce((sum, t) => sum + t, 0);

  let totalDependencies = 0;
  for (const chunk of chunks) {
    kinds[chunk.kind]++;
    totalDependencies += chunk.dependencies.length;
    chunk.dependencies.forEach((dep) => unique.add(dep));
  }

  const byTag: Record<DependencyTag, number> = { var: 0, template: 0, function: 0 };
  for (const dep of unique) {
    const tag = tagOf(dep);
    if (tag) byTag[tag]++;
  }

  return {
    totalChunks: chunks.length,
    totalLines: chunks.reduce((sum, chunk) => sum + chunk.lines.length, 0),
    totalTokens,
    averageTokens: chunks.length > 0 ? Math.floor(totalTokens / chunks.length) : 0,
    minTokens: tokens.length > 0 ? tokens.reduce((a, b) => Math.min(a, b)) : 0,
    maxTokens: tokens.reduce((a, b) => Math.max(a, b), 0),
    kinds,
    helperTemplates: chunks.filter((c) => c.kind === 'helper_template').map(listing),
    mainTemplates: chunks.filter((c) => c.kind === 'main_template').map(listing),
    dependencies: {
      total: totalDependencies,
      unique: unique.size,
      byTag,
    },
    patterns: {
      chooseBlocks: chunks.filter((c) => c.metadata.hasChooseBlocks === true).length,
      variables: chunks.filter((c) => c.metadata.hasVariables === true).length,
      xpath: chunks.filter((c) => c.metadata.hasXpath === true).length,
    },
    oversizedChunks: chunks.filter((c) => c.estimatedTokens > maxTokensPerChunk).map((c) => c.id),
    subChunkCount: chunks.filter((c) => c.metadata.isSubChunk === true).length,
  };
}
