import { share } from '../../../util/index.js';
import type { Table } from '../../table/types.js';
import type { ZeroShareEvidence } from '../qualityTypes.js';

/**
 * Numeric columns where exact zeros make up more than `threshold` of all
 * rows (missing rows included in the denominator).
 */
export function checkZeroValues(table: Table, threshold: number): readonly ZeroShareEvidence[] {
  const evidence: ZeroShareEvidence[] = [];

  for (const column of table.columns) {
    if (column.kind !== 'numeric') {
      continue;
    }
    const zeros = column.values.filter((v) => v === 0).length;
    const zeroShare = share(zeros, table.rowCount);
    if (zeroShare > threshold) {
      evidence.push({ column: column.name, zeroShare });
    }
  }

  return evidence;
}
