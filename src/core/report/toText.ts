import { CHECK_LABELS, FLAG_LABELS, formatShare, formatStat } from './format.js';
import type { EdaResult } from './reportTypes.js';

/**
 * Format an EdaResult as human-readable text.
 */
export function toText(result: EdaResult): string {
  const lines: string[] = [];
  const { quality } = result;

  lines.push('=== EDA Overview ===');
  lines.push('');

  if (result.metadata.timestamp !== null) {
    lines.push(`Timestamp: ${result.metadata.timestamp}`);
  }
  lines.push(`Source:    ${result.metadata.source}`);
  lines.push(`Rows:      ${String(result.metadata.rowCount)}`);
  lines.push(`Columns:   ${String(result.metadata.columnCount)}`);
  lines.push('');

  lines.push('--- Columns ---');
  for (const col of result.summary.columns) {
    const base = `  ${col.name} [${col.kind}] missing=${String(col.missingCount)} (${formatShare(col.missingShare)}) unique=${String(col.uniqueCount)}`;
    if (col.kind === 'numeric') {
      lines.push(
        `${base} min=${formatStat(col.min)} max=${formatStat(col.max)} mean=${formatStat(col.mean)} std=${formatStat(col.std)}`,
      );
    } else {
      lines.push(base);
    }
  }
  if (result.summary.columns.length === 0) {
    lines.push('  (no columns)');
  }
  lines.push('');

  lines.push('--- Data Quality ---');
  lines.push(`  Score: ${quality.qualityScore.toFixed(2)}`);
  for (const [flag, label] of FLAG_LABELS) {
    lines.push(`  [${quality.flags[flag] ? 'x' : ' '}] ${label}`);
  }
  for (const p of quality.penalties) {
    lines.push(`    -${p.penalty.toFixed(4)} ${CHECK_LABELS[p.check]}`);
  }

  lines.push('');
  return lines.join('\n');
}
