import { resolveQualityConfig } from '../config/parse.js';
import type { QualityConfig } from '../config/schema.js';
import type { Table } from '../table/types.js';
import { checkMissing } from './qualityChecks/checkMissing.js';
import { checkDuplicateRows } from './qualityChecks/checkDuplicateRows.js';
import { checkConstantColumns } from './qualityChecks/checkConstantColumns.js';
import { checkHighCardinality } from './qualityChecks/checkHighCardinality.js';
import { checkIdDuplicates } from './qualityChecks/checkIdDuplicates.js';
import { checkZeroValues } from './qualityChecks/checkZeroValues.js';
import { computePenalties, scoreFromPenalties } from './scoreQuality.js';
import type { QualityFlags, QualityMetrics, QualityReport } from './qualityTypes.js';

/**
 * Derive quality flags, evidence and a weighted-penalty score for a table.
 *
 * Thresholds are validated before anything is scanned; a malformed value
 * throws InvalidConfigurationError. Data content never throws: empty
 * tables, missing values and absent column kinds are reported as flags.
 * The table is only read.
 */
export function analyzeQuality(table: Table, config?: QualityConfig): QualityReport {
  const resolved = resolveQualityConfig(config);

  const missing = checkMissing(table);
  const metrics: QualityMetrics = {
    rowCount: table.rowCount,
    columnCount: table.columns.length,
    missingShares: missing.missingShares,
    maxMissingShare: missing.maxMissingShare,
    duplicateRowCount: checkDuplicateRows(table),
    constantColumns: checkConstantColumns(table),
    highCardinalityColumns: checkHighCardinality(table, resolved.highCardinalityThreshold),
    suspiciousIdColumns: checkIdDuplicates(table),
    manyZeroColumns: checkZeroValues(table, resolved.zeroThreshold),
  };

  const flags: QualityFlags = {
    hasMissing: missing.hasMissing,
    hasDuplicateRows: metrics.duplicateRowCount > 0,
    hasConstantColumn: metrics.constantColumns.length > 0,
    hasHighCardinalityCategories: metrics.highCardinalityColumns.length > 0,
    hasSuspiciousIdDuplicates: metrics.suspiciousIdColumns.length > 0,
    hasManyZeroValues: metrics.manyZeroColumns.length > 0,
  };

  const penalties = computePenalties(flags, metrics);

  return {
    flags,
    qualityScore: scoreFromPenalties(penalties),
    penalties,
    metrics,
    config: resolved,
  };
}
