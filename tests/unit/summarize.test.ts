import { describe, it, expect } from 'vitest';
import { createTable } from '../../src/core/table/createTable.js';
import { missingTable, summarizeDataset } from '../../src/core/summary/summarize.js';
import { correlationMatrix, pearson } from '../../src/core/summary/correlation.js';
import { topCategories } from '../../src/core/summary/topCategories.js';

const sample = () =>
  createTable({
    age: [10, 20, 30, null],
    height: [140, 150, 160, 170],
    city: ['A', 'B', 'A', null],
  });

describe('summarizeDataset', () => {
  it('reports shape and per-column statistics', () => {
    const summary = summarizeDataset(sample());

    expect(summary.rowCount).toBe(4);
    expect(summary.columnCount).toBe(3);
    expect(summary.columns[0]).toEqual({
      name: 'age',
      kind: 'numeric',
      nonNullCount: 3,
      missingCount: 1,
      missingShare: 0.25,
      uniqueCount: 3,
      examples: ['10', '20', '30'],
      min: 10,
      max: 30,
      mean: 20,
      std: 10,
    });
    expect(summary.columns[2]).toEqual({
      name: 'city',
      kind: 'categorical',
      nonNullCount: 3,
      missingCount: 1,
      missingShare: 0.25,
      uniqueCount: 2,
      examples: ['A', 'B'],
      min: null,
      max: null,
      mean: null,
      std: null,
    });
  });

  it('leaves std empty for a single value', () => {
    const [column] = summarizeDataset(createTable({ x: [5, null] })).columns;
    expect(column?.mean).toBe(5);
    expect(column?.std).toBeNull();
  });

  it('summarizes a table without rows', () => {
    const [column] = summarizeDataset(createTable({ x: [] })).columns;
    expect(column?.missingShare).toBe(0);
    expect(column?.examples).toEqual([]);
  });
});

describe('missingTable', () => {
  it('orders by missing share, then name', () => {
    const table = createTable({ b: [null, 1], a: [null, 1], c: [1, 1], d: [null, null] });
    expect(missingTable(table)).toEqual([
      { column: 'd', missingCount: 2, missingShare: 1 },
      { column: 'a', missingCount: 1, missingShare: 0.5 },
      { column: 'b', missingCount: 1, missingShare: 0.5 },
      { column: 'c', missingCount: 0, missingShare: 0 },
    ]);
  });
});

describe('correlationMatrix', () => {
  it('correlates numeric columns over complete pairs', () => {
    const matrix = correlationMatrix(sample());

    expect(matrix.columns).toEqual(['age', 'height']);
    expect(matrix.values[0]?.[0]).toBe(1);
    expect(matrix.values[0]?.[1]).toBeCloseTo(1, 10);
    expect(matrix.values[1]?.[0]).toBeCloseTo(1, 10);
  });

  it('is empty with fewer than two numeric columns', () => {
    expect(correlationMatrix(createTable({ a: [1, 2], b: ['x', 'y'] }))).toEqual({ columns: [], values: [] });
  });

  it('returns null for zero variance', () => {
    expect(pearson([1, 1, 1], [1, 2, 3])).toBeNull();
  });

  it('returns -1 for a perfect inverse relation', () => {
    expect(pearson([1, 2, 3], [3, 2, 1])).toBeCloseTo(-1, 10);
  });

  it('returns null with fewer than two complete pairs', () => {
    expect(pearson([1, null, 3], [null, 2, null])).toBeNull();
  });
});

describe('topCategories', () => {
  it('lists the most frequent values with shares of present values', () => {
    const tables = topCategories(sample(), { topK: 1 });
    expect(tables).toEqual([{ column: 'city', values: [{ value: 'A', count: 2, share: 2 / 3 }] }]);
  });

  it('orders ties by first appearance', () => {
    const table = createTable({ c: ['y', 'x', 'x', 'y', 'z'] });
    expect(topCategories(table)[0]?.values.map((v) => v.value)).toEqual(['y', 'x', 'z']);
  });

  it('limits the number of columns', () => {
    const table = createTable({ a: ['1x'], b: ['2x'], c: ['3x'] });
    expect(topCategories(table, { maxColumns: 2 }).map((t) => t.column)).toEqual(['a', 'b']);
  });

  it('renders mixed values as text', () => {
    const table = createTable({ c: ['a', 2, 2, true] });
    expect(topCategories(table)).toEqual([
      {
        column: 'c',
        values: [
          { value: '2', count: 2, share: 0.5 },
          { value: 'a', count: 1, share: 0.25 },
          { value: 'true', count: 1, share: 0.25 },
        ],
      },
    ]);
  });

  it('returns nothing without categorical columns', () => {
    expect(topCategories(createTable({ n: [1, 2] }))).toEqual([]);
  });
});
