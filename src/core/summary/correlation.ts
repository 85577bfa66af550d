import type { NumericColumn, Table } from '../table/types.js';
import type { CorrelationMatrix } from './summaryTypes.js';

/**
 * Pearson correlation between every pair of numeric columns, computed over
 * rows where both values are present. Empty when there are fewer than two
 * numeric columns.
 */
export function correlationMatrix(table: Table): CorrelationMatrix {
  const numeric = table.columns.filter((c): c is NumericColumn => c.kind === 'numeric');
  if (numeric.length < 2) {
    return { columns: [], values: [] };
  }

  const values = numeric.map((a) => numeric.map((b) => pearson(a.values, b.values)));
  return { columns: numeric.map((c) => c.name), values };
}

/**
 * Pearson coefficient over pairwise-complete observations.
 * Null with fewer than two pairs or zero variance on either side.
 */
export function pearson(a: readonly (number | null)[], b: readonly (number | null)[]): number | null {
  const xs: number[] = [];
  const ys: number[] = [];
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i] ?? null;
    const y = b[i] ?? null;
    if (x !== null && y !== null) {
      xs.push(x);
      ys.push(y);
    }
  }
  if (xs.length < 2) {
    return null;
  }

  const meanX = xs.reduce((s, v) => s + v, 0) / xs.length;
  const meanY = ys.reduce((s, v) => s + v, 0) / ys.length;
  let num = 0;
  let denX = 0;
  let denY = 0;
  for (let i = 0; i < xs.length; i++) {
    const dx = (xs[i] ?? 0) - meanX;
    const dy = (ys[i] ?? 0) - meanY;
    num += dx * dy;
    denX += dx * dx;
    denY += dy * dy;
  }
  if (denX === 0 || denY === 0) {
    return null;
  }
  // Rounding can push |r| a hair past 1
  return Math.max(-1, Math.min(1, num / Math.sqrt(denX * denY)));
}
