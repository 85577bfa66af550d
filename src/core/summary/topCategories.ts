import type { CategoricalColumn, Cell, Table } from '../table/types.js';
import type { CategoryTable } from './summaryTypes.js';

/** Options for topCategories. */
export interface TopCategoriesOptions {
  readonly maxColumns?: number | undefined;
  readonly topK?: number | undefined;
}

/**
 * Most frequent values of the first `maxColumns` categorical columns.
 * Equal counts keep the order in which values first appear.
 */
export function topCategories(table: Table, options: TopCategoriesOptions = {}): readonly CategoryTable[] {
  const maxColumns = options.maxColumns ?? 5;
  const topK = options.topK ?? 5;

  return table.columns
    .filter((c): c is CategoricalColumn => c.kind === 'categorical')
    .slice(0, maxColumns)
    .map((column) => {
      const counts = new Map<Cell, number>();
      let present = 0;
      for (const v of column.values) {
        if (v === null) continue;
        present += 1;
        counts.set(v, (counts.get(v) ?? 0) + 1);
      }
      const values = [...counts.entries()]
        .sort((a, b) => b[1] - a[1])
        .slice(0, topK)
        .map(([value, count]) => ({ value: String(value), count, share: count / present }));
      return { column: column.name, values };
    });
}
