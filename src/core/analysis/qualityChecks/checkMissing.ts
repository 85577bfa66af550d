import { share } from '../../../util/index.js';
import type { Table } from '../../table/types.js';

/** Per-column missing shares and their maximum. */
export interface MissingResult {
  readonly missingShares: Readonly<Record<string, number>>;
  readonly maxMissingShare: number;
  readonly hasMissing: boolean;
}

/**
 * Share of missing values per column. Shares are 0 for a table without rows.
 */
export function checkMissing(table: Table): MissingResult {
  const entries: [string, number][] = [];
  let hasMissing = false;
  let maxMissingShare = 0;

  for (const column of table.columns) {
    let missing = 0;
    for (const v of column.values) {
      if (v === null) missing += 1;
    }
    const missingShare = share(missing, table.rowCount);
    entries.push([column.name, missingShare]);
    if (missing > 0) hasMissing = true;
    if (missingShare > maxMissingShare) maxMissingShare = missingShare;
  }

  return { missingShares: Object.fromEntries(entries), maxMissingShare, hasMissing };
}
