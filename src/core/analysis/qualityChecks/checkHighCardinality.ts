import { countDistinct } from '../../../util/index.js';
import type { Table } from '../../table/types.js';
import type { CardinalityEvidence } from '../qualityTypes.js';

/** Categorical columns whose distinct count exceeds the threshold. */
export function checkHighCardinality(table: Table, threshold: number): readonly CardinalityEvidence[] {
  const evidence: CardinalityEvidence[] = [];

  for (const column of table.columns) {
    if (column.kind !== 'categorical') {
      continue;
    }
    const distinctCount = countDistinct(column.values);
    if (distinctCount > threshold) {
      evidence.push({ column: column.name, distinctCount });
    }
  }

  return evidence;
}
