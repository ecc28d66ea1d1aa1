/**
 * Token Estimation
 *
 * Heuristic token counts for XSLT text. The chunker never depends on a
 * particular tokenizer: it accepts any TokenEstimator, and this module
 * provides the default.
 *
 * Note: These are approximations. For precise counts, inject an estimator
 * backed by the consumer's real tokenizer.
 */

/**
 * Estimate the token count of a piece of text. Must be pure and return an
 * integer >= 0.
 */
export type TokenEstimator = (text: string) => number;

export type EstimationMethod = 'chars' | 'words' | 'hybrid' | 'xml_aware';

export const ESTIMATION_METHODS: readonly EstimationMethod[] = [
  'chars',
  'words',
  'hybrid',
  'xml_aware',
];

/** Average characters per token */
const CHARS_PER_TOKEN = 4;

/** Average words per token */
const WORDS_PER_TOKEN = 0.75;

/** Extra weight for each markup tag */
const TAG_WEIGHT = 0.5;

/** Extra weight for each XPath-looking expression */
const XPATH_WEIGHT = 0.3;

const TAG_PATTERN = /<[^>]+>/g;

/**
 * XPath-looking fragments: axis steps, attribute references and select
 * expressions containing a path or attribute.
 */
export const XPATH_PATTERN =
  /(\/\/|@\w+|\.\.\/|\.\/)[\w[\]/.():@-]*|@\w+|select="[^"]*[/@]/g;

function countMatches(text: string, pattern: RegExp): number {
  return text.match(pattern)?.length ?? 0;
}

function byChars(text: string): number {
  return Math.max(1, Math.floor(text.length / CHARS_PER_TOKEN));
}

function byWords(text: string): number {
  const words = text.split(/\s+/).filter((word) => word.length > 0).length;
  return Math.max(1, Math.floor(words / WORDS_PER_TOKEN));
}

function hybrid(text: string): number {
  return Math.floor((byChars(text) + byWords(text)) / 2);
}

function xmlAware(text: string): number {
  const tags = countMatches(text, TAG_PATTERN);
  const xpaths = countMatches(text, XPATH_PATTERN);
  return Math.max(
    1,
    Math.floor(hybrid(text) + tags * TAG_WEIGHT + xpaths * XPATH_WEIGHT)
  );
}

const METHODS: Record<EstimationMethod, TokenEstimator> = {
  chars: byChars,
  words: byWords,
  hybrid,
  xml_aware: xmlAware,
};

/**
 * Create an estimator for the given method. Every method returns 0 for
 * empty text and at least 1 otherwise.
 */
export function createTokenEstimator(
  method: EstimationMethod = 'xml_aware'
): TokenEstimator {
  const estimate = METHODS[method];
  return (text: string) => (text.length === 0 ? 0 : estimate(text));
}

/**
 * Default estimator: hybrid char/word estimate plus markup adjustments.
 */
export const estimateTokens: TokenEstimator = createTokenEstimator('xml_aware');
