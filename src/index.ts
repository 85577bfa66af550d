export type {
  EdaResult,
  EdaMetadata,
  OutputFormat,
  MarkdownOptions,
} from './core/report/reportTypes.js';

export type {
  QualityReport,
  QualityFlags,
  QualityMetrics,
  QualityCheck,
  Penalty,
  CardinalityEvidence,
  IdDuplicateEvidence,
  ZeroShareEvidence,
} from './core/analysis/qualityTypes.js';

export type {
  Cell,
  Column,
  ColumnKind,
  NumericColumn,
  CategoricalColumn,
  OtherColumn,
  Table,
} from './core/table/types.js';

export type {
  DatasetSummary,
  ColumnSummary,
  MissingRow,
  CorrelationMatrix,
  CategoryTable,
  CategoryCount,
} from './core/summary/summaryTypes.js';

export type { QualityConfig, ResolvedQualityConfig } from './core/config/schema.js';
export type { ConfigIssue } from './core/errors.js';
export type { CsvGrid, CsvOptions } from './core/table/parseCsv.js';
export type { LoadCsvOptions } from './core/table/loadCsv.js';

export { InvalidConfigurationError, TableShapeError, CsvParseError } from './core/errors.js';
export { analyzeQuality } from './core/analysis/analyzeQuality.js';
export { createTable, createTableFromColumns } from './core/table/createTable.js';
export { createTableFromRows } from './core/table/fromRows.js';
export { parseCsv } from './core/table/parseCsv.js';
export { loadCsv } from './core/table/loadCsv.js';
export { summarizeDataset, missingTable } from './core/summary/summarize.js';
export { correlationMatrix } from './core/summary/correlation.js';
export { topCategories } from './core/summary/topCategories.js';
export { resolveQualityConfig, parseQualityConfig, loadQualityConfigFile } from './core/config/parse.js';
export { toJson } from './core/report/toJson.js';
export { toText } from './core/report/toText.js';
export { toMarkdown } from './core/report/toMarkdown.js';
export { writeReport } from './core/report/writeReport.js';

import { analyzeQuality } from './core/analysis/analyzeQuality.js';
import { parseQualityConfig } from './core/config/parse.js';
import { loadCsv } from './core/table/loadCsv.js';
import { summarizeDataset, missingTable } from './core/summary/summarize.js';
import { correlationMatrix } from './core/summary/correlation.js';
import { topCategories } from './core/summary/topCategories.js';
import type { QualityConfig } from './core/config/schema.js';
import type { EdaResult } from './core/report/reportTypes.js';
import type { Table } from './core/table/types.js';

/** Options for analyzing an in-memory table. */
export interface AnalyzeDatasetOptions {
  readonly source?: string | undefined;
  readonly quality?: QualityConfig | undefined;
  readonly noTimestamp?: boolean | undefined;
  readonly topK?: number | undefined;
  readonly maxCategoryColumns?: number | undefined;
}

/**
 * Summarize a table and score its quality.
 * Thresholds are validated before any statistic is computed.
 */
export function analyzeDataset(table: Table, options: AnalyzeDatasetOptions = {}): EdaResult {
  const quality = analyzeQuality(table, options.quality);

  return {
    summary: summarizeDataset(table),
    quality,
    missing: missingTable(table),
    correlation: correlationMatrix(table),
    topCategories: topCategories(table, {
      maxColumns: options.maxCategoryColumns,
      topK: options.topK,
    }),
    metadata: {
      source: options.source ?? '<memory>',
      timestamp: options.noTimestamp === true ? null : new Date().toISOString(),
      rowCount: table.rowCount,
      columnCount: table.columns.length,
    },
  };
}

/** Options for the explore function. */
export interface ExploreOptions extends Omit<AnalyzeDatasetOptions, 'source'> {
  readonly csvPath: string;
  readonly separator?: string | undefined;
  readonly encoding?: BufferEncoding | undefined;
}

/**
 * Load a CSV file and run the full analysis on it.
 * Configuration errors surface before the file is read.
 */
export function explore(options: ExploreOptions): EdaResult {
  const quality = parseQualityConfig(options.quality);
  const table = loadCsv(options.csvPath, {
    separator: options.separator,
    encoding: options.encoding,
  });
  return analyzeDataset(table, { ...options, source: options.csvPath, quality });
}
