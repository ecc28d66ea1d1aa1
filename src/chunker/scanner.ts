/**
 * Boundary Scanner
 *
 * Single forward pass over the document lines. Each line yields at most
 * one boundary; the first matching marker wins, in this order:
 * template start, template end, variable, import/include, choose start,
 * choose end.
 */

import { classifyTemplate } from './classifier.js';
import {
  TEMPLATE_START,
  TEMPLATE_OPENING_TAG,
  TEMPLATE_END,
  VARIABLE_DECLARATION,
  IMPORT_INCLUDE,
  CHOOSE_START,
  CHOOSE_END,
  readAttribute,
} from './patterns.js';
import type { Boundary, TemplateStartBoundary } from './types.js';

/**
 * Name of a template from its opening tag: `name`, else `match:<match>`.
 */
export function extractTemplateName(tag: string): string | null {
  const name = readAttribute(tag, 'name');
  if (name !== null) return name;

  const match = readAttribute(tag, 'match');
  return match !== null ? `match:${match}` : null;
}

function scanTemplateStart(
  line: string,
  lineNumber: number,
  helperPatterns: readonly RegExp[]
): TemplateStartBoundary {
  const tag = line.slice(line.indexOf('<xsl:template'));
  const opening = TEMPLATE_OPENING_TAG.exec(tag)?.[0];
  const name = extractTemplateName(opening ?? tag);

  const closesOnSameLine =
    opening !== undefined &&
    (opening.endsWith('/>') || TEMPLATE_END.test(tag.slice(opening.length)));

  return {
    kind: 'template_start',
    line: lineNumber,
    name,
    templateKind: classifyTemplate(name, helperPatterns),
    closesOnSameLine,
  };
}

/**
 * Scan one line (1-based `lineNumber`). Returns null for ordinary content.
 */
export function scanLine(
  line: string,
  lineNumber: number,
  helperPatterns: readonly RegExp[]
): Boundary | null {
  if (TEMPLATE_START.test(line)) {
    return scanTemplateStart(line, lineNumber, helperPatterns);
  }

  if (TEMPLATE_END.test(line)) {
    return { kind: 'template_end', line: lineNumber };
  }

  if (VARIABLE_DECLARATION.test(line)) {
    return { kind: 'variable_declaration', line: lineNumber, name: readAttribute(line, 'name') };
  }

  const include = IMPORT_INCLUDE.exec(line);
  if (include) {
    return {
      kind: 'import_include',
      line: lineNumber,
      directive: include[1] === 'include' ? 'include' : 'import',
      href: readAttribute(line, 'href'),
    };
  }

  if (CHOOSE_START.test(line)) {
    return { kind: 'choose_start', line: lineNumber };
  }

  if (CHOOSE_END.test(line)) {
    return { kind: 'choose_end', line: lineNumber };
  }

  return null;
}

/**
 * Scan every line. Boundaries come back in ascending line order.
 */
export function scanBoundaries(lines: readonly string[], helperPatterns: readonly RegExp[]): Boundary[] {
  const boundaries: Boundary[] = [];

  lines.forEach((line, index) => {
    const boundary = scanLine(line, index + 1, helperPatterns);
    if (boundary) {
      boundaries.push(boundary);
    }
  });

  return boundaries;
}
