import { describe, it, expect } from 'vitest';
import { columnValues, mapRow, toResultTable } from '../../src/execution/row-mapper.js';

describe('mapRow', () => {
  it('keeps only the listed columns, in order', () => {
    const result = mapRow({ b: 2, a: 1, extra: 'x' }, ['a', 'b']);
    expect(Object.keys(result)).toEqual(['a', 'b']);
    expect(result).toEqual({ a: 1, b: 2 });
  });

  it('fills a missing column with null', () => {
    expect(mapRow({ a: 1 }, ['a', 'b'])).toEqual({ a: 1, b: null });
  });

  it('keeps null and falsy values as they are', () => {
    expect(mapRow({ a: null, b: 0, c: '' }, ['a', 'b', 'c'])).toEqual({ a: null, b: 0, c: '' });
  });
});

describe('toResultTable', () => {
  const rows = [
    { carrier: 'AA', n: 3 },
    { carrier: 'UA', n: 5 },
  ];

  it('takes the column order from the driver fields', () => {
    const table = toResultTable({ fields: ['n', 'carrier'], rows }, 'SELECT 1', ['carrier', 'n']);
    expect(table.columns).toEqual(['n', 'carrier']);
    expect(Object.keys(table.rows[0] ?? {})).toEqual(['n', 'carrier']);
  });

  it('falls back to the expected columns', () => {
    const table = toResultTable({ rows }, 'SELECT 1', ['n', 'carrier']);
    expect(table.columns).toEqual(['n', 'carrier']);
  });

  it('falls back to the keys of the first row', () => {
    expect(toResultTable({ rows }, 'SELECT 1').columns).toEqual(['carrier', 'n']);
  });

  it('handles an empty result', () => {
    expect(toResultTable({ rows: [] }, 'SELECT 1')).toEqual({ columns: [], rows: [], sql: 'SELECT 1' });
  });

  it('keeps the statement', () => {
    expect(toResultTable({ rows }, 'SELECT *\nFROM flights').sql).toBe('SELECT *\nFROM flights');
  });
});

describe('columnValues', () => {
  const table = toResultTable({ rows: [{ x: 1 }, { x: 2 }] }, 'SELECT x');

  it('returns one column top to bottom', () => {
    expect(columnValues(table, 'x')).toEqual([1, 2]);
  });

  it('throws for an unknown column', () => {
    expect(() => columnValues(table, 'y')).toThrow('Result has no column "y"; columns: x');
  });
});
