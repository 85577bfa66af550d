import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { toJson } from './toJson.js';
import { toMarkdown } from './toMarkdown.js';
import { categoryToCsv, correlationToCsv, missingToCsv, summaryToCsv } from './toCsv.js';
import type { EdaResult, MarkdownOptions } from './reportTypes.js';

/**
 * Write report.md, quality.json and the CSV tables into `outDir`.
 * Optional tables (missing, correlation, categories) are skipped when empty.
 * Returns the written paths in write order.
 */
export function writeReport(outDir: string, result: EdaResult, options: MarkdownOptions = {}): readonly string[] {
  mkdirSync(outDir, { recursive: true });
  const written: string[] = [];

  const write = (relativePath: string, content: string): void => {
    const target = join(outDir, relativePath);
    writeFileSync(target, content, 'utf-8');
    written.push(target);
  };

  write('summary.csv', summaryToCsv(result.summary.columns));
  if (result.quality.metrics.maxMissingShare > 0) {
    write('missing.csv', missingToCsv(result.missing));
  }
  if (result.correlation.columns.length > 0) {
    write('correlation.csv', correlationToCsv(result.correlation));
  }
  if (result.topCategories.length > 0) {
    mkdirSync(join(outDir, 'top_categories'), { recursive: true });
    const used = new Set<string>();
    for (const table of result.topCategories) {
      const file = uniqueFileName(table.column, used);
      write(join('top_categories', file), categoryToCsv(table));
    }
  }
  write('quality.json', toJson(result.quality, true));
  write('report.md', toMarkdown(result, options));

  return written;
}

/** Filesystem-safe `<column>.csv` name, suffixed on collision. */
function uniqueFileName(column: string, used: Set<string>): string {
  const base = column.replace(/[^A-Za-z0-9_.-]+/g, '_') || 'column';
  let name = `${base}.csv`;
  let n = 1;
  while (used.has(name)) {
    n += 1;
    name = `${base}_${String(n)}.csv`;
  }
  used.add(name);
  return name;
}
