import type { CategoryTable, ColumnSummary, CorrelationMatrix, MissingRow } from '../summary/summaryTypes.js';

type CsvValue = string | number | boolean | null;

/**
 * Render a header and rows as CSV. Fields containing a comma, quote or
 * newline are quoted; null becomes an empty field.
 */
export function toCsv(header: readonly string[], rows: readonly (readonly CsvValue[])[]): string {
  const lines = [header, ...rows].map((row) => row.map(escapeCsvValue).join(','));
  return `${lines.join('\n')}\n`;
}

function escapeCsvValue(value: CsvValue): string {
  if (value === null) return '';
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function summaryToCsv(columns: readonly ColumnSummary[]): string {
  return toCsv(
    ['name', 'kind', 'non_null', 'missing', 'missing_share', 'unique', 'example_values', 'min', 'max', 'mean', 'std'],
    columns.map((c) => [
      c.name,
      c.kind,
      c.nonNullCount,
      c.missingCount,
      c.missingShare,
      c.uniqueCount,
      c.examples.join('|'),
      c.min,
      c.max,
      c.mean,
      c.std,
    ]),
  );
}

export function missingToCsv(rows: readonly MissingRow[]): string {
  return toCsv(
    ['column', 'missing_count', 'missing_share'],
    rows.map((r) => [r.column, r.missingCount, r.missingShare]),
  );
}

export function correlationToCsv(matrix: CorrelationMatrix): string {
  return toCsv(
    ['', ...matrix.columns],
    matrix.columns.map((name, i) => [name, ...(matrix.values[i] ?? [])]),
  );
}

export function categoryToCsv(table: CategoryTable): string {
  return toCsv(
    ['value', 'count', 'share'],
    table.values.map((v) => [v.value, v.count, v.share]),
  );
}
