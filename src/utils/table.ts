/**
 * Table Formatting Utility
 *
 * Renders box-drawn tables for the analyze and chunk commands.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right' | 'center';

/**
 * Column definition.
 *
 * `value` pulls the cell out of a row, so callers can tabulate their own
 * record types without flattening them first.
 */
export interface Column<T> {
  header: string;
  value: (row: T) => string | number | null | undefined;
  /** Default: left */
  align?: Alignment;
  minWidth?: number;
}

const BOX = {
  topLeft: '┌',
  topRight: '┐',
  bottomLeft: '└',
  bottomRight: '┘',
  horizontal: '─',
  vertical: '│',
  teeDown: '┬',
  teeUp: '┴',
  teeLeft: '├',
  teeRight: '┤',
  cross: '┼',
} as const;

/**
 * Strip ANSI escape codes (for width calculation)
 */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/\x1B\[[0-9;]*m/g, '');
}

function padString(str: string, width: number, align: Alignment): string {
  const padding = width - stripAnsi(str).length;
  if (padding <= 0) return str;

  switch (align) {
    case 'right':
      return ' '.repeat(padding) + str;
    case 'center': {
      const left = Math.floor(padding / 2);
      return ' '.repeat(left) + str + ' '.repeat(padding - left);
    }
    case 'left':
    default:
      return str + ' '.repeat(padding);
  }
}

function cellText<T>(column: Column<T>, row: T): string {
  const value = column.value(row);
  return value != null ? String(value) : '';
}

/**
 * Format rows as a table.
 *
 * @example
 * ```ts
 * const columns: Column<ChunkSummary>[] = [
 *   { header: 'Id', value: (c) => c.id },
 *   { header: 'Tokens', value: (c) => c.estimated_tokens, align: 'right' },
 * ];
 * console.log(formatTable(columns, summaries));
 * ```
 */
export function formatTable<T>(columns: Column<T>[], rows: readonly T[]): string {
  if (columns.length === 0) return '';

  const body = rows.map((row) => columns.map((col) => cellText(col, row)));

  const widths = columns.map((col, i) => {
    let width = col.header.length;
    for (const cells of body) {
      width = Math.max(width, stripAnsi(cells[i] ?? '').length);
    }
    return Math.max(width, col.minWidth ?? 0);
  });

  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => BOX.horizontal.repeat(w + 2)).join(middle) + right;

  const line = (cells: string[], isHeader = false): string => {
    const padded = columns.map((col, i) => {
      const text = padString(cells[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
      return ` ${isHeader ? chalk.bold(text) : text} `;
    });
    return BOX.vertical + padded.join(BOX.vertical) + BOX.vertical;
  };

  const lines: string[] = [
    rule(BOX.topLeft, BOX.teeDown, BOX.topRight),
    line(columns.map((c) => c.header), true),
    rule(BOX.teeLeft, BOX.cross, BOX.teeRight),
    ...body.map((cells) => line(cells)),
    rule(BOX.bottomLeft, BOX.teeUp, BOX.bottomRight),
  ];

  return lines.join('\n');
}
