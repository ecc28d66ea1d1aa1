/**
 * Chunker Types
 *
 * Type definitions for the stylesheet chunking pipeline.
 */

import type { TokenEstimator } from '../tokens/index.js';
import type { Logger } from '../utils/logger.js';
import type { DocumentMetadata } from '../document/index.js';

/**
 * Structural category of a chunk.
 *
 * The builder emits templates and `unknown` filler; the remaining kinds
 * are part of the public vocabulary for consumers that label chunks
 * themselves.
 */
export type ChunkKind =
  | 'helper_template'
  | 'main_template'
  | 'variable_section'
  | 'import_section'
  | 'namespace_section'
  | 'choose_block'
  | 'unknown';

export type TemplateKind = Extract<ChunkKind, 'helper_template' | 'main_template'>;

export const CHUNK_KINDS: readonly ChunkKind[] = [
  'helper_template',
  'main_template',
  'variable_section',
  'import_section',
  'namespace_section',
  'choose_block',
  'unknown',
];

// ============================================================================
// Boundaries
// ============================================================================

export interface TemplateStartBoundary {
  kind: 'template_start';
  line: number;
  /** Declared name, else `match:<pattern>`, else null */
  name: string | null;
  templateKind: TemplateKind;
  /** The template also ends on this line (self-closing or one-liner) */
  closesOnSameLine: boolean;
}

export interface TemplateEndBoundary {
  kind: 'template_end';
  line: number;
}

export interface VariableBoundary {
  kind: 'variable_declaration';
  line: number;
  name: string | null;
}

export interface ImportBoundary {
  kind: 'import_include';
  line: number;
  directive: 'import' | 'include';
  href: string | null;
}

export interface ChooseStartBoundary {
  kind: 'choose_start';
  line: number;
}

export interface ChooseEndBoundary {
  kind: 'choose_end';
  line: number;
}

/**
 * A structural marker found by the scanner. Lines are 1-based.
 */
export type Boundary =
  | TemplateStartBoundary
  | TemplateEndBoundary
  | VariableBoundary
  | ImportBoundary
  | ChooseStartBoundary
  | ChooseEndBoundary;

// ============================================================================
// Semantic boundaries (inside large main templates)
// ============================================================================

export type SemanticBoundary =
  | { kind: 'major_output_element'; line: number; elementName: string }
  | { kind: 'for_each_loop'; line: number; selectPath: string; indent: number }
  | { kind: 'variable_cluster'; line: number; clusterSize: number }
  | { kind: 'choose_block'; line: number; endLine: number };

export type SemanticBoundaryKind = SemanticBoundary['kind'];

export type SplitStrategy = 'semantic' | 'generic';

// ============================================================================
// Chunks
// ============================================================================

export interface ChunkMetadata {
  // Sub-chunk lineage
  isSubChunk?: true;
  parentChunkId?: string;
  /** 0-based position among the parent's sub-chunks */
  subChunkIndex?: number;
  /** First line that is not repeated overlap */
  coreStartLine?: number;
  overlapLineCount?: number;
  splitStrategy?: SplitStrategy;
  /** Semantic boundaries inside the core span */
  semanticBoundaries?: SemanticBoundary[];

  /** Template was still open at end of input */
  implicitlyClosed?: true;

  // Enrichment
  hasChooseBlocks?: boolean;
  hasVariables?: boolean;
  hasXpath?: boolean;
  complexityScore?: number;
}

export interface Chunk {
  /** chunk_000, chunk_001, ...; sub-chunks chunk_003_sub_00, ... */
  id: string;
  kind: ChunkKind;
  name: string | null;
  /** Starting line in the document (1-indexed, includes overlap) */
  startLine: number;
  /** Ending line in the document (1-indexed, inclusive) */
  endLine: number;
  /** Raw lines, exactly endLine - startLine + 1 of them */
  lines: string[];
  estimatedTokens: number;
  /** Sorted and deduplicated: var:x, template:y, function:ns:f */
  dependencies: string[];
  metadata: ChunkMetadata;
}

/**
 * Flat projection for serialization (snake_case, like the config surface).
 */
export interface ChunkSummary {
  id: string;
  kind: ChunkKind;
  name: string | null;
  start_line: number;
  end_line: number;
  line_count: number;
  estimated_tokens: number;
  dependencies: string[];
}

// ============================================================================
// Pipeline options and results
// ============================================================================

/**
 * Injected capabilities for a chunking run.
 */
export interface ChunkerOptions {
  /** Default: the xml-aware estimator */
  estimateTokens?: TokenEstimator;
  /** Default: silent */
  logger?: Logger;
}

/**
 * Result of chunking one document.
 */
export interface DocumentChunkResult {
  filePath: string;
  success: boolean;
  chunks: Chunk[];
  /** Present when the file was read */
  document?: DocumentMetadata;
  /** Error message (present when success=false) */
  error?: string;
  /** Exit code of the error (present when success=false) */
  errorCode?: number;
}

/**
 * Result of chunking several documents.
 */
export interface BatchChunkResult {
  files: DocumentChunkResult[];
  successCount: number;
  failureCount: number;
  totalChunks: number;
  errors: string[];
}
