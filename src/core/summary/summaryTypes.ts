import type { ColumnKind } from '../table/types.js';

/** Descriptive statistics for one column. */
export interface ColumnSummary {
  readonly name: string;
  readonly kind: ColumnKind;
  readonly nonNullCount: number;
  readonly missingCount: number;
  readonly missingShare: number;
  readonly uniqueCount: number;
  readonly examples: readonly string[];
  /** Numeric columns only; null otherwise or when no value is present. */
  readonly min: number | null;
  readonly max: number | null;
  readonly mean: number | null;
  /** Sample standard deviation; null below two values. */
  readonly std: number | null;
}

/** Shape and per-column statistics of a table. */
export interface DatasetSummary {
  readonly rowCount: number;
  readonly columnCount: number;
  readonly columns: readonly ColumnSummary[];
}

/** One row of the missing-values table. */
export interface MissingRow {
  readonly column: string;
  readonly missingCount: number;
  readonly missingShare: number;
}

/** Pairwise Pearson correlations; `values[i][j]` pairs `columns[i]` and `columns[j]`. */
export interface CorrelationMatrix {
  readonly columns: readonly string[];
  readonly values: readonly (readonly (number | null)[])[];
}

/** A frequent value of a categorical column. */
export interface CategoryCount {
  readonly value: string;
  readonly count: number;
  /** Share of the column's non-missing values. */
  readonly share: number;
}

/** The most frequent values of one categorical column. */
export interface CategoryTable {
  readonly column: string;
  readonly values: readonly CategoryCount[];
}
