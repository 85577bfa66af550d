import type { QualityReport } from '../analysis/qualityTypes.js';
import type {
  CategoryTable,
  CorrelationMatrix,
  DatasetSummary,
  MissingRow,
} from '../summary/summaryTypes.js';

/** Output format options. */
export type OutputFormat = 'json' | 'text';

/** The complete exploration result for one dataset. */
export interface EdaResult {
  readonly summary: DatasetSummary;
  readonly quality: QualityReport;
  readonly missing: readonly MissingRow[];
  readonly correlation: CorrelationMatrix;
  readonly topCategories: readonly CategoryTable[];
  readonly metadata: EdaMetadata;
}

/** Metadata about the run. */
export interface EdaMetadata {
  readonly source: string;
  readonly timestamp: string | null;
  readonly rowCount: number;
  readonly columnCount: number;
}

/** Options controlling the Markdown report. */
export interface MarkdownOptions {
  readonly title?: string | undefined;
  /** Columns at or above this missing share are listed by name. */
  readonly minMissingShare?: number | undefined;
}
