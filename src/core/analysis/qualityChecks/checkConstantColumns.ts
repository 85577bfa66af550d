import { countDistinct } from '../../../util/index.js';
import type { Table } from '../../table/types.js';

/**
 * Names of columns holding exactly one distinct non-missing value.
 * An all-missing column has no distinct values and is not constant.
 */
export function checkConstantColumns(table: Table): readonly string[] {
  return table.columns
    .filter((column) => countDistinct(column.values) === 1)
    .map((column) => column.name);
}
