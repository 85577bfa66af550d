import type { Penalty, QualityFlags, QualityMetrics } from './qualityTypes.js';

/** Weight applied to the largest per-column missing share. */
const MISSING_WEIGHT = 0.3;
/** Weight applied to the duplicate row share, capped at DUPLICATE_CAP. */
const DUPLICATE_WEIGHT = 0.5;
const DUPLICATE_CAP = 0.2;
/** Weight applied to the share of constant columns. */
const CONSTANT_WEIGHT = 0.1;
const HIGH_CARDINALITY_PENALTY = 0.15;
const ID_DUPLICATE_PENALTY = 0.2;
const MANY_ZERO_PENALTY = 0.1;

/**
 * Penalties for every raised flag, in check order.
 * Unraised flags contribute nothing and are omitted.
 */
export function computePenalties(flags: QualityFlags, metrics: QualityMetrics): readonly Penalty[] {
  const penalties: Penalty[] = [];

  if (flags.hasMissing) {
    penalties.push({ check: 'missing', penalty: metrics.maxMissingShare * MISSING_WEIGHT });
  }
  if (flags.hasDuplicateRows) {
    const duplicateShare = metrics.duplicateRowCount / metrics.rowCount;
    penalties.push({
      check: 'duplicateRows',
      penalty: Math.min(duplicateShare * DUPLICATE_WEIGHT, DUPLICATE_CAP),
    });
  }
  if (flags.hasConstantColumn) {
    penalties.push({
      check: 'constantColumns',
      penalty: (CONSTANT_WEIGHT * metrics.constantColumns.length) / metrics.columnCount,
    });
  }
  if (flags.hasHighCardinalityCategories) {
    penalties.push({ check: 'highCardinality', penalty: HIGH_CARDINALITY_PENALTY });
  }
  if (flags.hasSuspiciousIdDuplicates) {
    penalties.push({ check: 'suspiciousIdDuplicates', penalty: ID_DUPLICATE_PENALTY });
  }
  if (flags.hasManyZeroValues) {
    penalties.push({ check: 'manyZeroValues', penalty: MANY_ZERO_PENALTY });
  }

  return penalties;
}

/** 1.0 minus the summed penalties, never below 0. */
export function scoreFromPenalties(penalties: readonly Penalty[]): number {
  const total = penalties.reduce((sum, p) => sum + p.penalty, 0);
  return Math.max(0, 1 - total);
}
