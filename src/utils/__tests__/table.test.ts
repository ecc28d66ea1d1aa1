/**
 * Tests for table formatting utility
 */

import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatTable, stripAnsi, type Column } from '../table.js';

interface Item {
  name: string;
  count: number | null;
}

const render = <T>(columns: Column<T>[], rows: T[]): string[] =>
  stripAnsi(formatTable(columns, rows)).split('\n');

describe('formatTable', () => {
  const nameColumn: Column<Item> = { header: 'Name', value: (r) => r.name };
  const countColumn: Column<Item> = {
    header: 'Count',
    value: (r) => r.count,
    align: 'right',
  };

  describe('basic rendering', () => {
    it('renders a header, separator and one line per row', () => {
      const lines = render([nameColumn, countColumn], [
        { name: 'foo', count: 1 },
        { name: 'barbaz', count: 100 },
      ]);

      expect(lines).toEqual([
        '┌────────┬───────┐',
        '│ Name   │ Count │',
        '├────────┼───────┤',
        '│ foo    │     1 │',
        '│ barbaz │   100 │',
        '└────────┴───────┘',
      ]);
    });

    it('renders headers and borders when there are no rows', () => {
      const lines = render([nameColumn], []);

      expect(lines).toEqual(['┌──────┐', '│ Name │', '├──────┤', '└──────┘']);
    });

    it('returns empty string when no columns', () => {
      expect(formatTable([], [])).toBe('');
    });
  });

  describe('column alignment', () => {
    it('centers text when specified', () => {
      const lines = render(
        [{ header: 'Status', value: (r: { s: string }) => r.s, align: 'center' }],
        [{ s: 'OK' }]
      );

      expect(lines[3]).toBe('│   OK   │');
    });
  });

  describe('column widths', () => {
    it('respects minWidth', () => {
      const lines = render([{ ...nameColumn, minWidth: 10 }], [{ name: 'x', count: 0 }]);

      expect(lines[0]).toBe('┌────────────┐');
    });

    it('renders null values as empty cells', () => {
      const lines = render([countColumn], [{ name: 'a', count: null }]);

      expect(lines[3]).toBe('│       │');
    });

    it('ignores ANSI codes when measuring cells', () => {
      const lines = render(
        [{ header: 'Kind', value: (r: { k: string }) => chalk.green(r.k) }],
        [{ k: 'helper' }]
      );

      expect(lines[3]).toBe('│ helper │');
      expect(lines[0]).toBe('┌────────┐');
    });
  });
});
