import { createTableFromColumns } from './createTable.js';
import type { Cell, Table } from './types.js';

/** Text values read as missing, matching the usual dataframe NA markers. */
const NA_MARKERS: ReadonlySet<string> = new Set([
  '',
  '#N/A',
  '#N/A N/A',
  '#NA',
  '-1.#IND',
  '-1.#QNAN',
  '-NaN',
  '-nan',
  '1.#IND',
  '1.#QNAN',
  '<NA>',
  'N/A',
  'NA',
  'NULL',
  'NaN',
  'None',
  'n/a',
  'nan',
  'null',
]);

const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const INFINITY_PATTERN = /^([+-]?)(?:inf|infinity)$/i;
const BOOLEAN_LITERALS: ReadonlyMap<string, boolean> = new Map([
  ['true', true],
  ['True', true],
  ['TRUE', true],
  ['false', false],
  ['False', false],
  ['FALSE', false],
]);

/**
 * Build a typed table from string cells, e.g. the output of parseCsv.
 *
 * Each column is converted as a whole: numbers when every present value is
 * numeric text, booleans when every present value is a boolean literal,
 * otherwise the raw strings. Duplicate header names get `.1`, `.2` suffixes.
 */
export function createTableFromRows(
  header: readonly string[],
  rows: readonly (readonly string[])[],
): Table {
  const names = uniqueNames(header);
  const entries = names.map((name, index): readonly [string, readonly Cell[]] => {
    const raw = rows.map((row) => row[index] ?? '');
    return [name, convertColumn(raw)];
  });
  return createTableFromColumns(entries);
}

function convertColumn(raw: readonly string[]): Cell[] {
  const present = raw.filter((v) => !NA_MARKERS.has(v));

  if (present.length > 0 && present.every((v) => parseNumber(v) !== null)) {
    return raw.map((v) => (NA_MARKERS.has(v) ? null : parseNumber(v)));
  }
  if (present.length > 0 && present.every((v) => BOOLEAN_LITERALS.has(v))) {
    return raw.map((v) => BOOLEAN_LITERALS.get(v) ?? null);
  }
  return raw.map((v) => (NA_MARKERS.has(v) ? null : v));
}

/** Parse decimal or infinity text; returns null for anything else. */
export function parseNumber(text: string): number | null {
  const trimmed = text.trim();
  if (NUMBER_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  const inf = INFINITY_PATTERN.exec(trimmed);
  if (inf !== null) {
    return inf[1] === '-' ? -Infinity : Infinity;
  }
  return null;
}

function uniqueNames(header: readonly string[]): string[] {
  const counts = new Map<string, number>();
  const taken = new Set<string>();
  return header.map((rawName, index) => {
    const base = rawName === '' ? `Unnamed: ${String(index)}` : rawName;
    let name = base;
    let n = counts.get(base) ?? 0;
    while (taken.has(name)) {
      n += 1;
      name = `${base}.${String(n)}`;
    }
    counts.set(base, n);
    taken.add(name);
    return name;
  });
}
