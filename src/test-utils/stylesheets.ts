/**
 * Builders for stylesheet fixtures, one array element per line.
 */

/**
 * `count` plain content lines that match no boundary pattern.
 */
export function filler(count: number, indent = '      ', label = 'field'): string[] {
  return Array.from({ length: count }, (_, i) => `${indent}<out:${label}>${i}</out:${label}>`);
}

/**
 * A template: opening tag with the given attributes, body, closing tag.
 */
export function template(attributes: string, body: string[], indent = '  '): string[] {
  return [`${indent}<xsl:template ${attributes}>`, ...body, `${indent}</xsl:template>`];
}

/**
 * A for-each loop at the given indent wrapping `bodyCount` filler lines.
 */
export function forEachBlock(select: string, bodyCount: number, indent = '    '): string[] {
  return [
    `${indent}<xsl:for-each select="${select}">`,
    ...filler(bodyCount, indent + '    '),
    `${indent}</xsl:for-each>`,
  ];
}

/**
 * Wrap parts in a stylesheet element.
 */
export function stylesheet(...parts: string[][]): string[] {
  return [
    '<xsl:stylesheet version="2.0" xmlns:xsl="http://www.w3.org/1999/XSL/Transform">',
    ...parts.flat(),
    '</xsl:stylesheet>',
  ];
}
