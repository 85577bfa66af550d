import type { QualityCheck, QualityFlags } from '../analysis/qualityTypes.js';

/** Human-readable labels for each flag, in report order. */
export const FLAG_LABELS: readonly (readonly [keyof QualityFlags, string])[] = [
  ['hasMissing', 'Missing values'],
  ['hasDuplicateRows', 'Duplicate rows'],
  ['hasConstantColumn', 'Constant columns'],
  ['hasHighCardinalityCategories', 'High-cardinality categories'],
  ['hasSuspiciousIdDuplicates', 'Duplicated identifiers'],
  ['hasManyZeroValues', 'Zero-heavy numeric columns'],
];

export const CHECK_LABELS: Readonly<Record<QualityCheck, string>> = {
  missing: 'Missing values',
  duplicateRows: 'Duplicate rows',
  constantColumns: 'Constant columns',
  highCardinality: 'High-cardinality categories',
  suspiciousIdDuplicates: 'Duplicated identifiers',
  manyZeroValues: 'Zero-heavy numeric columns',
};

/** Format a 0..1 share as a percentage with two decimals. */
export function formatShare(value: number): string {
  return `${(value * 100).toFixed(2)}%`;
}

/** Format an optional statistic; integers print without decimals. */
export function formatStat(value: number | null): string {
  if (value === null) return '-';
  return Number.isInteger(value) ? String(value) : value.toFixed(4);
}
