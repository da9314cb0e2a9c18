/**
 * Tests for table formatting utility
 *
 * Tests cover:
 * - Box structure
 * - Column alignment
 * - Width calculations (minWidth, maxWidth truncation)
 * - Empty cells
 */

import { describe, it, expect } from 'vitest';
import { formatTable, type Column, type Row } from '../table.js';

describe('formatTable', () => {
  describe('structure', () => {
    it('returns empty string when no columns', () => {
      expect(formatTable([], [])).toBe('');
    });

    it('draws borders around header and rows', () => {
      const columns: Column[] = [
        { header: 'A', key: 'a' },
        { header: 'B', key: 'b' },
      ];
      const lines = formatTable(columns, [{ a: '1', b: '2' }]).split('\n');

      expect(lines).toHaveLength(5);
      expect(lines[0]).toMatch(/^┌─+┬─+┐$/);
      expect(lines[2]).toMatch(/^├─+┼─+┤$/);
      expect(lines[3]).toBe('│ 1 │ 2 │');
      expect(lines[4]).toMatch(/^└─+┴─+┘$/);
    });

    it('keeps header and borders when there are no rows', () => {
      const lines = formatTable([{ header: 'Document', key: 'id' }], []).split('\n');
      expect(lines).toHaveLength(4);
      expect(lines[3]).toBe('└──────────┘');
    });
  });

  describe('alignment', () => {
    it('pads right-aligned numbers on the left', () => {
      const columns: Column[] = [{ header: 'Chunks', key: 'n', align: 'right' }];
      const lines = formatTable(columns, [{ n: 3 }, { n: 120 }]).split('\n');

      expect(lines[3]).toBe('│      3 │');
      expect(lines[4]).toBe('│    120 │');
    });

    it('pads left-aligned text on the right', () => {
      const columns: Column[] = [{ header: 'Id', key: 'id' }];
      const lines = formatTable(columns, [{ id: 'doc1' }]).split('\n');
      expect(lines[3]).toBe('│ doc1 │');
    });
  });

  describe('widths', () => {
    it('respects minWidth', () => {
      const columns: Column[] = [{ header: 'X', key: 'x', minWidth: 10 }];
      const lines = formatTable(columns, [{ x: '1' }]).split('\n');
      expect(lines[0]).toBe('┌' + '─'.repeat(12) + '┐');
    });

    it('cuts values longer than maxWidth with an ellipsis', () => {
      const columns: Column[] = [{ header: 'Preview', key: 'p', maxWidth: 8 }];
      const rows: Row[] = [{ p: 'Python is a language.' }];
      const lines = formatTable(columns, rows).split('\n');

      expect(lines[3]).toBe('│ Python … │');
    });

    it('collapses newlines inside cut values', () => {
      const columns: Column[] = [{ header: 'Preview', key: 'p', maxWidth: 9 }];
      const lines = formatTable(columns, [{ p: 'def a():\n  return 1' }]).split('\n');

      expect(lines[3]).toBe('│ def a():… │');
    });
  });

  describe('null and undefined handling', () => {
    it('renders null and missing values as empty cells', () => {
      const columns: Column[] = [
        { header: 'Name', key: 'name' },
        { header: 'Ok', key: 'ok' },
      ];
      const rows: Row[] = [{ name: null }];
      const lines = formatTable(columns, rows).split('\n');

      expect(lines[3]).toBe('│      │    │');
    });
  });
});
