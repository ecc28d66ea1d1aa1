import { describe, it, expect } from 'vitest';
import { complexityScore, enrichChunk, extractDependencies } from '../enricher.js';
import type { Chunk } from '../types.js';

describe('extractDependencies', () => {
  it('collects variables, called templates and prefixed functions, sorted', () => {
    const text = [
      '<xsl:value-of select="fn:string($total)"/>',
      '<xsl:call-template name="vmf:vmf1_inputtoresult"/>',
      '<xsl:value-of select="$code"/><xsl:value-of select="$total"/>',
    ].join('\n');

    expect(extractDependencies(text)).toEqual([
      'function:fn:string',
      'template:vmf:vmf1_inputtoresult',
      'var:code',
      'var:total',
    ]);
  });

  it('accepts single-quoted template names', () => {
    expect(extractDependencies("<xsl:call-template name='format-date'/>")).toEqual([
      'template:format-date',
    ]);
  });

  it('ignores unprefixed function calls', () => {
    expect(extractDependencies('<xsl:value-of select="string(.)"/>')).toEqual([]);
  });
});

describe('complexityScore', () => {
  it('is 1 for empty text', () => {
    expect(complexityScore('')).toBe(1);
  });

  it('scales with length', () => {
    expect(complexityScore('a'.repeat(500))).toBe(0.5);
  });

  it('weights choose blocks', () => {
    expect(complexityScore('<xsl:choose>' + 'a'.repeat(988))).toBe(1.5);
  });

  it('caps at 10', () => {
    expect(complexityScore('a'.repeat(20000))).toBe(10);
  });
});

describe('enrichChunk', () => {
  function chunk(lines: string[], dependencies: string[] = []): Chunk {
    return {
      id: 'chunk_000',
      kind: 'unknown',
      name: null,
      startLine: 1,
      endLine: lines.length,
      lines,
      estimatedTokens: 0,
      dependencies,
      metadata: {},
    };
  }

  it('sets dependencies and content flags', () => {
    const enriched = enrichChunk(chunk(['<xsl:choose>', '<xsl:when test="@code = 1"/>', '</xsl:choose>']));

    expect(enriched.dependencies).toEqual([]);
    expect(enriched.metadata.hasChooseBlocks).toBe(true);
    expect(enriched.metadata.hasVariables).toBe(false);
    expect(enriched.metadata.hasXpath).toBe(true);
  });

  it('keeps existing dependencies and is idempotent', () => {
    const target = chunk(['<xsl:variable name="x" select="$y"/>'], ['var:z']);

    enrichChunk(target);
    const first = structuredClone(target);
    enrichChunk(target);

    expect(target.dependencies).toEqual(['var:y', 'var:z']);
    expect(target.metadata.hasVariables).toBe(true);
    expect(target.metadata.hasXpath).toBe(false);
    expect(target.metadata.complexityScore).toBeCloseTo(1.2 * 0.036);
    expect(target).toEqual(first);
  });
});
