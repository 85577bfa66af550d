import { countRepeats } from '../../../util/index.js';
import type { Table } from '../../table/types.js';

/**
 * Count rows that exactly repeat an earlier row; the first occurrence
 * is not counted. Missing cells compare equal to each other.
 */
export function checkDuplicateRows(table: Table): number {
  if (table.columns.length === 0) {
    return 0;
  }

  const keys: string[] = [];
  for (let row = 0; row < table.rowCount; row++) {
    // Tagged by type: a mixed column may hold both 1 and "1", and JSON
    // alone would turn Infinity into null.
    const cells = table.columns.map((column) => {
      const v = column.values[row] ?? null;
      return v === null ? null : [typeof v, String(v)];
    });
    keys.push(JSON.stringify(cells));
  }

  return countRepeats(keys);
}
