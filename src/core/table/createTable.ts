import { TableShapeError } from '../errors.js';
import type { Cell, Column, Table } from './types.js';

/**
 * Build a typed table from a record of named value arrays.
 * Column order follows the record's insertion order.
 */
export function createTable(data: Readonly<Record<string, readonly Cell[]>>): Table {
  return createTableFromColumns(Object.entries(data));
}

/**
 * Build a typed table from ordered (name, values) pairs.
 * Throws TableShapeError when the columns differ in length.
 */
export function createTableFromColumns(entries: readonly (readonly [string, readonly Cell[]])[]): Table {
  const rowCount = entries[0]?.[1].length ?? 0;
  const seen = new Set<string>();

  const columns = entries.map(([name, values]) => {
    if (seen.has(name)) {
      throw new TableShapeError(`Duplicate column name "${name}"`);
    }
    seen.add(name);
    if (values.length !== rowCount) {
      throw new TableShapeError(
        `Column "${name}" has ${String(values.length)} values, expected ${String(rowCount)}`,
      );
    }
    return toColumn(name, values);
  });

  return { columns, rowCount };
}

/** Resolve the column kind from its non-missing values. */
function toColumn(name: string, raw: readonly Cell[]): Column {
  const values = raw.map(normalizeCell);
  let hasNumber = false;
  let hasString = false;
  let hasBoolean = false;

  for (const v of values) {
    if (typeof v === 'number') hasNumber = true;
    else if (typeof v === 'string') hasString = true;
    else if (typeof v === 'boolean') hasBoolean = true;
  }

  if (hasString || (hasNumber && hasBoolean)) {
    return { kind: 'categorical', name, values };
  }
  if (hasNumber) {
    return {
      kind: 'numeric',
      name,
      values: values.map((v) => (typeof v === 'number' ? v : null)),
    };
  }
  return {
    kind: 'other',
    name,
    values: values.map((v) => (typeof v === 'boolean' ? v : null)),
  };
}

/** NaN is a missing marker, not a number. */
function normalizeCell(value: Cell): Cell {
  return typeof value === 'number' && Number.isNaN(value) ? null : value;
}
