import { basename } from 'node:path';
import { CHECK_LABELS, FLAG_LABELS, formatShare, formatStat } from './format.js';
import type { EdaResult, MarkdownOptions } from './reportTypes.js';

export const DEFAULT_REPORT_TITLE = 'EDA Report';
export const DEFAULT_MIN_MISSING_SHARE = 0.1;

/**
 * Render the Markdown report. Tabular details are referenced by the
 * artifact names writeReport produces alongside it.
 */
export function toMarkdown(result: EdaResult, options: MarkdownOptions = {}): string {
  const title = options.title ?? DEFAULT_REPORT_TITLE;
  const minMissingShare = options.minMissingShare ?? DEFAULT_MIN_MISSING_SHARE;
  const { quality, summary } = result;
  const lines: string[] = [];

  lines.push(`# ${title}`, '');
  lines.push(`Source file: \`${basename(result.metadata.source)}\``, '');
  if (result.metadata.timestamp !== null) {
    lines.push(`Generated: ${result.metadata.timestamp}`, '');
  }
  lines.push(`Rows: **${String(summary.rowCount)}**, columns: **${String(summary.columnCount)}**`, '');

  lines.push('## Data quality', '');
  lines.push(`- Quality score: **${quality.qualityScore.toFixed(2)}**`);
  lines.push(`- Max missing share per column: **${formatShare(quality.metrics.maxMissingShare)}**`);
  lines.push(`- Duplicate row count: **${String(quality.metrics.duplicateRowCount)}**`);
  for (const [flag, label] of FLAG_LABELS) {
    lines.push(`- ${label}: **${String(quality.flags[flag])}**`);
  }
  lines.push('');

  if (quality.penalties.length === 0) {
    lines.push('No penalties applied.', '');
  } else {
    lines.push('| Check | Penalty |', '|---|---|');
    for (const p of quality.penalties) {
      lines.push(`| ${CHECK_LABELS[p.check]} | ${p.penalty.toFixed(4)} |`);
    }
    lines.push('');
  }

  const { metrics } = quality;
  if (metrics.constantColumns.length > 0) {
    lines.push(`Constant columns: ${metrics.constantColumns.map(code).join(', ')}`, '');
  }
  if (metrics.highCardinalityColumns.length > 0) {
    const items = metrics.highCardinalityColumns.map((e) => `${code(e.column)} (${String(e.distinctCount)} distinct)`);
    lines.push(`High-cardinality columns (> ${String(quality.config.highCardinalityThreshold)}): ${items.join(', ')}`, '');
  }
  if (metrics.suspiciousIdColumns.length > 0) {
    const items = metrics.suspiciousIdColumns.map((e) => `${code(e.column)} (${String(e.duplicateCount)} duplicates)`);
    lines.push(`Identifier columns with duplicates: ${items.join(', ')}`, '');
  }
  if (metrics.manyZeroColumns.length > 0) {
    const items = metrics.manyZeroColumns.map((e) => `${code(e.column)} (${formatShare(e.zeroShare)} zeros)`);
    lines.push(`Zero-heavy columns (> ${formatShare(quality.config.zeroThreshold)}): ${items.join(', ')}`, '');
  }

  lines.push(`## Columns with missing share >= ${formatShare(minMissingShare)}`, '');
  const incomplete = result.missing.filter((r) => r.missingCount > 0 && r.missingShare >= minMissingShare);
  lines.push(incomplete.length === 0 ? 'None.' : incomplete.map((r) => code(r.column)).join(', '), '');

  lines.push('## Columns', '');
  if (summary.columns.length === 0) {
    lines.push('The dataset has no columns.', '');
  } else {
    lines.push('| Column | Kind | Missing | Unique | Min | Max | Mean |', '|---|---|---|---|---|---|---|');
    for (const c of summary.columns) {
      lines.push(
        `| ${escapeCell(c.name)} | ${c.kind} | ${formatShare(c.missingShare)} | ${String(c.uniqueCount)} | ${formatStat(c.min)} | ${formatStat(c.max)} | ${formatStat(c.mean)} |`,
      );
    }
    lines.push('', 'See `summary.csv`.', '');
  }

  lines.push('## Missing values', '');
  lines.push(
    metrics.maxMissingShare === 0
      ? 'No missing values, or the dataset is empty.'
      : 'See `missing.csv`.',
    '',
  );

  lines.push('## Correlation of numeric columns', '');
  lines.push(
    result.correlation.columns.length === 0
      ? 'Not enough numeric columns for correlation.'
      : 'See `correlation.csv`.',
    '',
  );

  lines.push('## Categorical columns', '');
  if (result.topCategories.length === 0) {
    lines.push('No categorical columns found.', '');
  } else {
    for (const table of result.topCategories) {
      lines.push(`### ${code(table.column)}`, '');
      for (const v of table.values) {
        lines.push(`- ${escapeCell(v.value)}: ${String(v.count)} (${formatShare(v.share)})`);
      }
      lines.push('');
    }
    lines.push('See the files in `top_categories/`.', '');
  }

  return lines.join('\n');
}

function code(name: string): string {
  return `\`${name}\``;
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|');
}
