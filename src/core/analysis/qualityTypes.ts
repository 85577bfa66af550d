import type { ResolvedQualityConfig } from '../config/schema.js';

/** Identifiers of the individual quality checks. */
export type QualityCheck =
  | 'missing'
  | 'duplicateRows'
  | 'constantColumns'
  | 'highCardinality'
  | 'suspiciousIdDuplicates'
  | 'manyZeroValues';

/** Boolean quality indicators, one per check. */
export interface QualityFlags {
  readonly hasMissing: boolean;
  readonly hasDuplicateRows: boolean;
  readonly hasConstantColumn: boolean;
  readonly hasHighCardinalityCategories: boolean;
  readonly hasSuspiciousIdDuplicates: boolean;
  readonly hasManyZeroValues: boolean;
}

/** A categorical column with more distinct values than allowed. */
export interface CardinalityEvidence {
  readonly column: string;
  readonly distinctCount: number;
}

/** An identifier-like column containing repeated values. */
export interface IdDuplicateEvidence {
  readonly column: string;
  readonly duplicateCount: number;
}

/** A numeric column dominated by exact zeros. */
export interface ZeroShareEvidence {
  readonly column: string;
  readonly zeroShare: number;
}

/** Evidence behind every flag. */
export interface QualityMetrics {
  readonly rowCount: number;
  readonly columnCount: number;
  readonly missingShares: Readonly<Record<string, number>>;
  readonly maxMissingShare: number;
  readonly duplicateRowCount: number;
  readonly constantColumns: readonly string[];
  readonly highCardinalityColumns: readonly CardinalityEvidence[];
  readonly suspiciousIdColumns: readonly IdDuplicateEvidence[];
  readonly manyZeroColumns: readonly ZeroShareEvidence[];
}

/** A penalty subtracted from the perfect score of 1.0. */
export interface Penalty {
  readonly check: QualityCheck;
  readonly penalty: number;
}

/** Result of a quality analysis. Created fresh on every call. */
export interface QualityReport {
  readonly flags: QualityFlags;
  readonly qualityScore: number;
  readonly penalties: readonly Penalty[];
  readonly metrics: QualityMetrics;
  readonly config: ResolvedQualityConfig;
}
