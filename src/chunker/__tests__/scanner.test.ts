import { describe, it, expect } from 'vitest';
import { readFileSync } from 'node:fs';
import { scanBoundaries, scanLine, extractTemplateName } from '../scanner.js';
import { compileHelperPatterns } from '../classifier.js';
import { HELPER_PATTERN_PRESETS } from '../../config/index.js';

const patterns = compileHelperPatterns([HELPER_PATTERN_PRESETS.mapforce]);

describe('extractTemplateName', () => {
  it('prefers name over match', () => {
    expect(extractTemplateName('<xsl:template match="x" name="y">')).toBe('y');
  });

  it('prefixes match patterns', () => {
    expect(extractTemplateName('<xsl:template match="Orders/Order">')).toBe('match:Orders/Order');
  });

  it('accepts single quotes', () => {
    expect(extractTemplateName("<xsl:template name='vmf:vmf2_x'>")).toBe('vmf:vmf2_x');
  });

  it('returns null without either attribute', () => {
    expect(extractTemplateName('<xsl:template mode="m">')).toBeNull();
  });
});

describe('scanLine', () => {
  it('detects a named template start and classifies it', () => {
    expect(scanLine('  <xsl:template name="vmf:vmf1_inputtoresult">', 4, patterns)).toEqual({
      kind: 'template_start',
      line: 4,
      name: 'vmf:vmf1_inputtoresult',
      templateKind: 'helper_template',
      closesOnSameLine: false,
    });
  });

  it('detects a match template start', () => {
    expect(scanLine('<xsl:template match="/">', 1, patterns)).toMatchObject({
      kind: 'template_start',
      name: 'match:/',
      templateKind: 'main_template',
    });
  });

  it('detects attributes after other attributes', () => {
    expect(scanLine('<xsl:template priority="2" match="Item">', 1, patterns)).toMatchObject({
      kind: 'template_start',
      name: 'match:Item',
    });
  });

  it('reads attribute values that contain a raw >', () => {
    expect(scanLine('<xsl:template match="item[@price > 10]">', 1, [])).toEqual({
      kind: 'template_start',
      line: 1,
      name: 'match:item[@price > 10]',
      templateKind: 'main_template',
      closesOnSameLine: false,
    });
    expect(scanLine("<xsl:template mode='a>b' name=\"vmf:vmf4_cmp\">", 2, patterns)).toMatchObject({
      name: 'vmf:vmf4_cmp',
      templateKind: 'helper_template',
    });
    expect(
      scanLine('<xsl:template match="n[. > 0]"><out:n/></xsl:template>', 3, patterns)
    ).toMatchObject({ name: 'match:n[. > 0]', closesOnSameLine: true });
  });

  it('ignores a template tag without name or match', () => {
    expect(scanLine('<xsl:template mode="x">', 1, patterns)).toBeNull();
  });

  it('flags self-closing and one-line templates', () => {
    expect(scanLine('<xsl:template name="noop"/>', 1, patterns)).toMatchObject({
      closesOnSameLine: true,
    });
    expect(
      scanLine('<xsl:template match="b"><out:b/></xsl:template>', 1, patterns)
    ).toMatchObject({ closesOnSameLine: true });
  });

  it('detects template end', () => {
    expect(scanLine('  </xsl:template>', 9, patterns)).toEqual({ kind: 'template_end', line: 9 });
  });

  it('does not mistake call-template for a template', () => {
    expect(scanLine('<xsl:call-template name="vmf:vmf1_x">', 1, patterns)).toBeNull();
    expect(scanLine('</xsl:call-template>', 1, patterns)).toBeNull();
  });

  it('detects variable declarations', () => {
    expect(scanLine('<xsl:variable name="total" select="sum(x)"/>', 3, patterns)).toEqual({
      kind: 'variable_declaration',
      line: 3,
      name: 'total',
    });
  });

  it('detects imports and includes', () => {
    expect(scanLine('<xsl:import href="common.xsl"/>', 2, patterns)).toEqual({
      kind: 'import_include',
      line: 2,
      directive: 'import',
      href: 'common.xsl',
    });
    expect(scanLine("<xsl:include href='helpers.xslt'/>", 3, patterns)).toEqual({
      kind: 'import_include',
      line: 3,
      directive: 'include',
      href: 'helpers.xslt',
    });
  });

  it('detects choose start and end', () => {
    expect(scanLine('    <xsl:choose>', 5, patterns)).toEqual({ kind: 'choose_start', line: 5 });
    expect(scanLine('    </xsl:choose>', 8, patterns)).toEqual({ kind: 'choose_end', line: 8 });
  });

  it('gives template start priority over other markers on the same line', () => {
    const line = '<xsl:template name="t"><xsl:variable name="v"/>';
    expect(scanLine(line, 1, patterns)?.kind).toBe('template_start');
  });

  it('returns null for content lines', () => {
    expect(scanLine('<xsl:value-of select="$total"/>', 1, patterns)).toBeNull();
    expect(scanLine('', 1, patterns)).toBeNull();
  });
});

describe('scanBoundaries', () => {
  it('scans the order mapping fixture', () => {
    const fixture = new URL('../../../fixtures/stylesheets/order-mapping.xslt', import.meta.url);
    const lines = readFileSync(fixture, 'utf-8').split('\n').slice(0, 32);

    const boundaries = scanBoundaries(lines, patterns);

    expect(boundaries.map((b) => [b.kind, b.line])).toEqual([
      ['template_start', 4],
      ['choose_start', 6],
      ['choose_end', 13],
      ['template_end', 14],
      ['template_start', 15],
      ['variable_declaration', 18],
      ['variable_declaration', 19],
      ['template_end', 31],
    ]);
  });

  it('returns boundaries in ascending line order', () => {
    const lines = ['<xsl:choose>', 'x', '</xsl:choose>', '<xsl:template match="/">'];
    const lineNumbers = scanBoundaries(lines, patterns).map((b) => b.line);

    expect(lineNumbers).toEqual([1, 3, 4]);
  });
});
