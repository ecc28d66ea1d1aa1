/**
 * Semantic Sub-Chunker
 *
 * Large main templates are cut where the stylesheet itself changes
 * subject: a new literal result section, a top-level loop, a block of
 * variable declarations, or a top-level choose. Pieces aim for
 * semantic.target_tokens and carry a small overlap of structurally
 * useful lines from the end of the previous piece.
 */

import {
  CHOOSE_TAG,
  CLOSING_TAG_LINE,
  FOR_EACH_START,
  MAJOR_OUTPUT_ELEMENT,
  MINOR_ELEMENT_NAMES,
  VARIABLE_DECLARATION,
  indentOf,
  readAttribute,
} from './patterns.js';
import type { Chunk, SemanticBoundary } from './types.js';
import type { ChunkerSettings, ChunkingContext } from './settings.js';
import { lineCosts, planGenericPieces, splitChunk } from './splitter.js';
import { materializeSubChunks, type PiecePlan } from './sub-chunks.js';

/** Loops nested less than this many columns deeper than the first are top-level */
const FOR_EACH_NESTING_COLUMNS = 4;

/** Declarations in a row needed to form a cluster */
const MIN_VARIABLE_CLUSTER = 2;

/** Lines always eligible for overlap, counted back from the cut */
const OVERLAP_FREE_LINES = 3;
const OVERLAP_MAX_LINES = 10;
const OVERLAP_MAX_TOKENS = 100;

// ============================================================================
// Detection
// ============================================================================

export function detectMajorOutputElements(
  lines: readonly string[],
  startLine: number
): SemanticBoundary[] {
  const found: SemanticBoundary[] = [];
  const pattern = new RegExp(MAJOR_OUTPUT_ELEMENT.source, 'g');

  lines.forEach((line, index) => {
    for (const match of line.matchAll(pattern)) {
      const elementName = match[1];
      if (elementName !== undefined && !MINOR_ELEMENT_NAMES.has(elementName)) {
        found.push({ kind: 'major_output_element', line: startLine + index, elementName });
        break;
      }
    }
  });

  return found;
}

export function detectForEachLoops(lines: readonly string[], startLine: number): SemanticBoundary[] {
  const found: SemanticBoundary[] = [];
  let baseIndent: number | undefined;

  lines.forEach((line, index) => {
    if (!FOR_EACH_START.test(line)) return;

    const indent = indentOf(line);
    if (baseIndent === undefined) {
      baseIndent = indent;
    }

    if (indent < baseIndent + FOR_EACH_NESTING_COLUMNS) {
      found.push({
        kind: 'for_each_loop',
        line: startLine + index,
        selectPath: readAttribute(line, 'select') ?? '',
        indent,
      });
    }
  });

  return found;
}

export function detectVariableClusters(
  lines: readonly string[],
  startLine: number
): SemanticBoundary[] {
  const found: SemanticBoundary[] = [];
  let runStart = -1;

  const closeRun = (end: number): void => {
    const size = end - runStart;
    if (runStart >= 0 && size >= MIN_VARIABLE_CLUSTER) {
      found.push({ kind: 'variable_cluster', line: startLine + runStart, clusterSize: size });
    }
    runStart = -1;
  };

  lines.forEach((line, index) => {
    if (VARIABLE_DECLARATION.test(line)) {
      if (runStart < 0) runStart = index;
    } else {
      closeRun(index);
    }
  });
  closeRun(lines.length);

  return found;
}

export function detectChooseBlocks(lines: readonly string[], startLine: number): SemanticBoundary[] {
  const found: SemanticBoundary[] = [];
  let depth = 0;
  let blockStart = 0;

  lines.forEach((line, index) => {
    for (const match of line.matchAll(CHOOSE_TAG)) {
      if (match[1] === '/') {
        if (depth === 0) continue;
        depth--;
        if (depth === 0) {
          found.push({
            kind: 'choose_block',
            line: startLine + blockStart,
            endLine: startLine + index,
          });
        }
      } else {
        if (depth === 0) blockStart = index;
        depth++;
      }
    }
  });

  return found;
}

/**
 * All semantic boundaries of a chunk's lines, by ascending line. When two
 * detectors claim the same line, the earlier detector wins (output
 * element, loop, variable cluster, choose block).
 */
export function findSemanticBoundaries(
  lines: readonly string[],
  startLine: number
): SemanticBoundary[] {
  const byLine = new Map<number, SemanticBoundary>();

  const detectors = [
    detectMajorOutputElements,
    detectForEachLoops,
    detectVariableClusters,
    detectChooseBlocks,
  ];

  for (const detect of detectors) {
    for (const boundary of detect(lines, startLine)) {
      if (!byLine.has(boundary.line)) {
        byLine.set(boundary.line, boundary);
      }
    }
  }

  return [...byLine.values()].sort((a, b) => a.line - b.line);
}

// ============================================================================
// Assembly
// ============================================================================

function sumCosts(costs: readonly number[], from: number, to: number): number {
  let total = 0;
  for (let i = from; i <= to; i++) total += costs[i] ?? 0;
  return total;
}

function isEssentialContext(line: string): boolean {
  return (
    line.trim() === '' ||
    VARIABLE_DECLARATION.test(line) ||
    FOR_EACH_START.test(line) ||
    CLOSING_TAG_LINE.test(line)
  );
}

/**
 * Start index of the overlap carried into a piece whose core starts at
 * `cut`. Scans backwards and stops at the first line that is neither one
 * of the first few nor structural context, or that would exceed the
 * budget of min(overlap/4, 100) tokens.
 */
export function semanticOverlapStart(
  lines: readonly string[],
  costs: readonly number[],
  cut: number,
  overlapTokens: number
): number {
  const budget = Math.min(Math.floor(overlapTokens / 4), OVERLAP_MAX_TOKENS);
  let start = cut;
  let total = 0;

  for (let i = cut - 1, scanned = 0; i >= 0 && scanned < OVERLAP_MAX_LINES; i--, scanned++) {
    const eligible = scanned < OVERLAP_FREE_LINES || isEssentialContext(lines[i] ?? '');
    const cost = costs[i] ?? 0;
    if (!eligible || total + cost > budget) break;

    total += cost;
    start = i;
  }

  return start;
}

/**
 * Plan semantic pieces over the whole chunk.
 *
 * A cut is made at a boundary once the lines since the previous cut reach
 * the target (or the semantic maximum) and exceed the minimum. A final
 * piece at or below the minimum is merged into its predecessor. Pieces
 * that still exceed the semantic maximum (capped by max_tokens_per_chunk)
 * are refined with the generic window at that budget.
 */
export function planSemanticPieces(
  lines: readonly string[],
  costs: readonly number[],
  boundaryIndices: readonly number[],
  settings: ChunkerSettings
): PiecePlan[] {
  const { targetTokens, maxTokens, minTokens } = settings.semantic;
  const cuts = [0];
  let accumulated = 0;
  let position = 0;

  for (const index of boundaryIndices) {
    if (index <= position || index >= lines.length) continue;

    while (position < index) {
      accumulated += costs[position] ?? 0;
      position++;
    }

    if ((accumulated >= targetTokens || accumulated >= maxTokens) && accumulated > minTokens) {
      cuts.push(index);
      accumulated = 0;
    }
  }

  const lastCut = cuts[cuts.length - 1] ?? 0;
  if (cuts.length > 1 && sumCosts(costs, lastCut, lines.length - 1) <= minTokens) {
    cuts.pop();
  }

  const budget = Math.min(maxTokens, settings.maxTokensPerChunk);
  const refineOverlap = Math.min(settings.overlapTokens, Math.floor(budget / 2));
  const plans: PiecePlan[] = [];

  cuts.forEach((coreStart, k) => {
    const end = (cuts[k + 1] ?? lines.length) - 1;
    const start = k === 0 ? 0 : semanticOverlapStart(lines, costs, coreStart, settings.overlapTokens);

    if (sumCosts(costs, start, end) > budget) {
      plans.push(...planGenericPieces(costs, start, end, budget, refineOverlap, coreStart));
    } else {
      plans.push({ start, coreStart, end, strategy: 'semantic' });
    }
  });

  return plans;
}

/**
 * Decompose a large main template. Falls back to the generic splitter
 * when no semantic boundary is found; keeps the chunk whole when the
 * boundaries never justify a cut.
 */
export function decomposeMainTemplate(chunk: Chunk, context: ChunkingContext): Chunk[] {
  const boundaries = findSemanticBoundaries(chunk.lines, chunk.startLine);

  if (boundaries.length === 0) {
    context.logger.debug?.(`${chunk.id}: no semantic boundaries, using generic split`);
    return splitChunk(chunk, context);
  }

  const costs = lineCosts(chunk.lines, context);
  const plans = planSemanticPieces(
    chunk.lines,
    costs,
    boundaries.map((b) => b.line - chunk.startLine),
    context.settings
  );

  context.logger.debug?.(
    `${chunk.id}: ${boundaries.length} semantic boundaries, ${plans.length} pieces`
  );

  const base = chunk.name ?? chunk.id;
  return materializeSubChunks(chunk, plans, context, {
    name: (index) => `${base}_section_${String(index).padStart(2, '0')}`,
    boundaries,
  });
}
