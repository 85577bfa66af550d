import { readFileSync } from 'node:fs';
import { parseCsv } from './parseCsv.js';
import { createTableFromRows } from './fromRows.js';
import type { Table } from './types.js';

/** Options for loading a CSV file. */
export interface LoadCsvOptions {
  readonly separator?: string | undefined;
  readonly encoding?: BufferEncoding | undefined;
}

/**
 * Read a CSV file into a typed table. The whole file is held in memory.
 */
export function loadCsv(filePath: string, options: LoadCsvOptions = {}): Table {
  const text = readFileSync(filePath, { encoding: options.encoding ?? 'utf-8' });
  const grid = parseCsv(text, { separator: options.separator });
  return createTableFromRows(grid.header, grid.rows);
}
