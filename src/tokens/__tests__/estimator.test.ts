import { describe, it, expect } from 'vitest';
import {
  createTokenEstimator,
  estimateTokens,
  ESTIMATION_METHODS,
} from '../estimator.js';

describe('createTokenEstimator', () => {
  it.each(ESTIMATION_METHODS)('returns 0 for empty text (%s)', (method) => {
    expect(createTokenEstimator(method)('')).toBe(0);
  });

  it('estimates by characters', () => {
    const estimate = createTokenEstimator('chars');

    expect(estimate('abcdefgh')).toBe(2);
    expect(estimate('abc')).toBe(1);
  });

  it('estimates by words', () => {
    const estimate = createTokenEstimator('words');

    // 3 words / 0.75
    expect(estimate('one two three')).toBe(4);
    expect(estimate('   ')).toBe(1);
  });

  it('averages chars and words for hybrid', () => {
    // chars 3, words 4
    expect(createTokenEstimator('hybrid')('one two three')).toBe(3);
  });

  it('adds weight for tags', () => {
    // hybrid 1, three tags at 0.5
    expect(createTokenEstimator('hybrid')('<a><b/></a>')).toBe(1);
    expect(createTokenEstimator('xml_aware')('<a><b/></a>')).toBe(2);
  });

  it('adds weight for xpath expressions', () => {
    // hybrid 3, four attribute references at 0.3
    expect(createTokenEstimator('hybrid')('@a @b @c @d')).toBe(3);
    expect(createTokenEstimator('xml_aware')('@a @b @c @d')).toBe(4);
  });

  it('defaults to the xml-aware method', () => {
    expect(createTokenEstimator()('<a><b/></a>')).toBe(2);
    expect(estimateTokens('<a><b/></a>')).toBe(2);
  });

  it('is deterministic', () => {
    const text = '<xsl:value-of select="Order/@id"/>';

    expect(estimateTokens(text)).toBe(estimateTokens(text));
  });
});
