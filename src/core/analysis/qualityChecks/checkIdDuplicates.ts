import { countRepeats } from '../../../util/index.js';
import type { Table } from '../../table/types.js';
import type { IdDuplicateEvidence } from '../qualityTypes.js';

/** Columns whose name contains "id" in any case are treated as identifiers. */
const ID_NAME_PATTERN = /id/i;

/**
 * Identifier-like columns with repeated values.
 * Any column kind qualifies; only the name decides.
 */
export function checkIdDuplicates(table: Table): readonly IdDuplicateEvidence[] {
  const evidence: IdDuplicateEvidence[] = [];

  for (const column of table.columns) {
    if (!ID_NAME_PATTERN.test(column.name)) {
      continue;
    }
    const duplicateCount = countRepeats<unknown>(column.values);
    if (duplicateCount > 0) {
      evidence.push({ column: column.name, duplicateCount });
    }
  }

  return evidence;
}
