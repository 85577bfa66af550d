import { countDistinct, share } from '../../util/index.js';
import type { Cell, Column, Table } from '../table/types.js';
import type { ColumnSummary, DatasetSummary, MissingRow } from './summaryTypes.js';

const EXAMPLE_COUNT = 3;

/**
 * Compute shape and per-column statistics for a table.
 */
export function summarizeDataset(table: Table): DatasetSummary {
  return {
    rowCount: table.rowCount,
    columnCount: table.columns.length,
    columns: table.columns.map((column) => summarizeColumn(column, table.rowCount)),
  };
}

function summarizeColumn(column: Column, rowCount: number): ColumnSummary {
  const present = presentValues(column);
  const missingCount = rowCount - present.length;
  const stats = column.kind === 'numeric' ? numericStats(present.filter(isNumber)) : EMPTY_STATS;

  return {
    name: column.name,
    kind: column.kind,
    nonNullCount: present.length,
    missingCount,
    missingShare: share(missingCount, rowCount),
    uniqueCount: countDistinct(present),
    examples: examplesOf(present),
    ...stats,
  };
}

/**
 * Per-column missing counts and shares, most incomplete first.
 */
export function missingTable(table: Table): readonly MissingRow[] {
  const rows = table.columns.map((column) => {
    const missingCount = table.rowCount - presentValues(column).length;
    return { column: column.name, missingCount, missingShare: share(missingCount, table.rowCount) };
  });
  return rows.sort((a, b) => {
    if (a.missingShare !== b.missingShare) return b.missingShare - a.missingShare;
    if (a.column < b.column) return -1;
    if (a.column > b.column) return 1;
    return 0;
  });
}

/** Non-missing values of a column, in row order. */
export function presentValues(column: Column): Cell[] {
  const present: Cell[] = [];
  for (const v of column.values) {
    if (v !== null) present.push(v);
  }
  return present;
}

interface NumericStats {
  readonly min: number | null;
  readonly max: number | null;
  readonly mean: number | null;
  readonly std: number | null;
}

const EMPTY_STATS: NumericStats = { min: null, max: null, mean: null, std: null };

function numericStats(values: readonly number[]): NumericStats {
  if (values.length === 0) {
    return EMPTY_STATS;
  }
  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  for (const v of values) {
    if (v < min) min = v;
    if (v > max) max = v;
    sum += v;
  }
  const mean = sum / values.length;
  if (values.length < 2) {
    return { min, max, mean, std: null };
  }
  const squared = values.reduce((acc, v) => acc + (v - mean) ** 2, 0);
  return { min, max, mean, std: Math.sqrt(squared / (values.length - 1)) };
}

function examplesOf(present: readonly Cell[]): string[] {
  const examples: string[] = [];
  const seen = new Set<Cell>();
  for (const v of present) {
    if (examples.length >= EXAMPLE_COUNT) break;
    if (!seen.has(v)) {
      seen.add(v);
      examples.push(String(v));
    }
  }
  return examples;
}

function isNumber(value: Cell): value is number {
  return typeof value === 'number';
}
