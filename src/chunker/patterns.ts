/**
 * Line-level markup patterns
 *
 * All detection is textual and line-based; nothing here parses XML.
 */

/** `<xsl:template ... name=` or `match=` on one line; quoted values may hold `>` */
export const TEMPLATE_START = /<xsl:template\b(?:[^>"']|"[^"]*"|'[^']*')*?\s(?:name|match)\s*=/;

/** Complete opening tag at the start of the text, quote-aware */
export const TEMPLATE_OPENING_TAG = /^<xsl:template\b(?:[^>"']|"[^"]*"|'[^']*')*>/;

export const TEMPLATE_END = /<\/xsl:template\s*>/;

export const VARIABLE_DECLARATION = /<xsl:variable\s+name\s*=/;

export const IMPORT_INCLUDE = /<xsl:(import|include)\s+href\s*=/;

export const CHOOSE_START = /<xsl:choose\s*>/;

export const CHOOSE_END = /<\/xsl:choose\s*>/;

/** Opening or closing choose tag, in document order */
export const CHOOSE_TAG = /<(\/?)xsl:choose\s*>/g;

export const FOR_EACH_START = /<xsl:for-each\b/;

/** Capitalized literal result element: `<Order`, `<Shipment ` */
export const MAJOR_OUTPUT_ELEMENT = /<([A-Z]\w{3,})(?=[\s/>]|$)/;

/** Acronym-like tags that are not section landmarks */
export const MINOR_ELEMENT_NAMES: ReadonlySet<string> = new Set(['XML', 'HTTP', 'URI', 'URL', 'ID']);

/** Any line starting with a closing tag */
export const CLOSING_TAG_LINE = /^\s*<\//;

/**
 * Read an attribute value (either quote style) from markup text.
 */
export function readAttribute(text: string, attribute: string): string | null {
  const match = new RegExp(`\\s${attribute}\\s*=\\s*(["'])(.*?)\\1`).exec(text);
  return match ? (match[2] ?? '') : null;
}

export function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}
