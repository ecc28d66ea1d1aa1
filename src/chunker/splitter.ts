/**
 * Generic Splitter
 *
 * Token-budget sliding window over a chunk's lines. Used for any chunk
 * above max_tokens_per_chunk that is not split semantically, and to
 * refine semantic pieces that are still too large.
 */

import type { Chunk } from './types.js';
import type { ChunkingContext } from './settings.js';
import { materializeSubChunks, type PiecePlan } from './sub-chunks.js';

/**
 * Per-line token costs of a chunk.
 */
export function lineCosts(lines: readonly string[], context: ChunkingContext): number[] {
  return lines.map((line) => context.estimateTokens(line));
}

function sum(costs: readonly number[], from: number, to: number): number {
  let total = 0;
  for (let i = from; i <= to; i++) {
    total += costs[i] ?? 0;
  }
  return total;
}

/**
 * First index of the trailing window of [from, to] whose cost stays
 * within the overlap budget. Returns to + 1 when not even the last line
 * fits.
 */
export function overlapWindowStart(
  costs: readonly number[],
  from: number,
  to: number,
  overlapTokens: number
): number {
  let start = to + 1;
  let total = 0;
  for (let i = to; i >= from; i--) {
    const cost = costs[i] ?? 0;
    if (total + cost > overlapTokens) break;
    total += cost;
    start = i;
  }
  return start;
}

/**
 * Plan sliding-window pieces over indices [from, to].
 *
 * Lines are accumulated greedily; when the next line would push the
 * running total over maxTokens, the buffer is sealed and the next buffer
 * starts with the longest tail of it that fits in overlapTokens. Lines
 * [from, coreStart) are carried-in overlap for the first piece.
 */
export function planGenericPieces(
  costs: readonly number[],
  from: number,
  to: number,
  maxTokens: number,
  overlapTokens: number,
  coreStart: number = from
): PiecePlan[] {
  const plans: PiecePlan[] = [];
  let start = from;
  let core = coreStart;
  let running = sum(costs, from, coreStart - 1);

  for (let i = coreStart; i <= to; i++) {
    const cost = costs[i] ?? 0;

    // A piece always keeps at least one line of its own
    if (running + cost > maxTokens && i > core) {
      plans.push({ start, coreStart: core, end: i - 1, strategy: 'generic' });
      start = overlapWindowStart(costs, start, i - 1, overlapTokens);
      core = i;
      running = sum(costs, start, i - 1);
    }

    running += cost;
  }

  plans.push({ start, coreStart: core, end: to, strategy: 'generic' });
  return plans;
}

/**
 * Split an oversized chunk into overlapping windows. Sub-chunk names are
 * `<name>_part_<i>` (null for unnamed parents).
 */
export function splitChunk(chunk: Chunk, context: ChunkingContext): Chunk[] {
  const { maxTokensPerChunk, overlapTokens } = context.settings;
  const costs = lineCosts(chunk.lines, context);
  const plans = planGenericPieces(costs, 0, chunk.lines.length - 1, maxTokensPerChunk, overlapTokens);

  context.logger.debug?.(`${chunk.id}: generic split into ${plans.length} pieces`);

  return materializeSubChunks(chunk, plans, context, {
    name: (index) => (chunk.name !== null ? `${chunk.name}_part_${index}` : null),
  });
}
