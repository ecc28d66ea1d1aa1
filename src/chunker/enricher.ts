/**
 * Dependency/Metadata Enricher
 *
 * Records what a chunk refers to (variables, called templates, prefixed
 * functions) and a few content flags, so consumers can pull in related
 * chunks or budget their analysis.
 */

import { XPATH_PATTERN } from '../tokens/index.js';
import { CHOOSE_START, VARIABLE_DECLARATION } from './patterns.js';
import type { Chunk } from './types.js';

const VARIABLE_REFERENCE = /\$(\w+)/g;
const TEMPLATE_CALL = /call-template\s+name=(["'])(.*?)\1/g;
const FUNCTION_CALL = /(\w+:\w+)\s*\(/g;

const COMPLEXITY_CAP = 10;

function global(pattern: RegExp): RegExp {
  return new RegExp(pattern.source, 'g');
}

function countMatches(text: string, pattern: RegExp): number {
  return text.match(global(pattern))?.length ?? 0;
}

/**
 * Dependencies referenced by a piece of text, as a sorted set.
 *
 * - `$total` → `var:total`
 * - `<xsl:call-template name="vmf:vmf1_inputtoresult">` → `template:vmf:vmf1_inputtoresult`
 * - `fn:count(` → `function:fn:count`
 */
export function extractDependencies(text: string): string[] {
  const found = new Set<string>();

  for (const match of text.matchAll(VARIABLE_REFERENCE)) {
    found.add(`var:${match[1] ?? ''}`);
  }
  for (const match of text.matchAll(TEMPLATE_CALL)) {
    found.add(`template:${match[2] ?? ''}`);
  }
  for (const match of text.matchAll(FUNCTION_CALL)) {
    found.add(`function:${match[1] ?? ''}`);
  }

  return [...found].sort();
}

/**
 * Rough density of control constructs per 1000 characters, capped at 10.
 */
export function complexityScore(text: string): number {
  let score = 1;
  score += countMatches(text, CHOOSE_START) * 0.5;
  score += countMatches(text, VARIABLE_DECLARATION) * 0.2;
  score += countMatches(text, XPATH_PATTERN) * 0.1;

  if (text.length > 0) {
    score *= text.length / 1000;
  }

  return Math.min(score, COMPLEXITY_CAP);
}

/**
 * Add dependencies and content flags to a chunk, in place. Existing
 * dependencies are kept; running it twice changes nothing.
 */
export function enrichChunk(chunk: Chunk): Chunk {
  const text = chunk.lines.join('\n');

  chunk.dependencies = [...new Set([...chunk.dependencies, ...extractDependencies(text)])].sort();
  chunk.metadata.hasChooseBlocks = CHOOSE_START.test(text);
  chunk.metadata.hasVariables = VARIABLE_DECLARATION.test(text);
  chunk.metadata.hasXpath = countMatches(text, XPATH_PATTERN) > 0;
  chunk.metadata.complexityScore = complexityScore(text);

  return chunk;
}
