import { CsvParseError } from '../errors.js';

/** Options for the CSV reader. */
export interface CsvOptions {
  readonly separator?: string | undefined;
}

/** Raw CSV content: a header row and string-valued data rows. */
export interface CsvGrid {
  readonly header: readonly string[];
  readonly rows: readonly (readonly string[])[];
}

interface CsvRecord {
  readonly fields: readonly string[];
  readonly line: number;
}

/** A separator is one character other than a quote or a line break. */
export function isValidSeparator(separator: string): boolean {
  return separator.length === 1 && separator !== '"' && separator !== '\n' && separator !== '\r';
}

/**
 * Parse RFC 4180 CSV text into a header and rows.
 *
 * Quoted fields may contain separators, newlines and doubled quotes.
 * Blank lines are skipped. Every row must have as many fields as the header.
 */
export function parseCsv(text: string, options: CsvOptions = {}): CsvGrid {
  const separator = options.separator ?? ',';
  if (!isValidSeparator(separator)) {
    throw new RangeError(`Invalid separator ${JSON.stringify(separator)}: must be a single character other than a quote or newline`);
  }

  const records = splitRecords(text.startsWith('\uFEFF') ? text.slice(1) : text, separator);
  const [first, ...rest] = records;
  if (first === undefined) {
    return { header: [], rows: [] };
  }

  const width = first.fields.length;
  for (const record of rest) {
    if (record.fields.length !== width) {
      throw new CsvParseError(
        `Expected ${String(width)} fields but found ${String(record.fields.length)}`,
        record.line,
      );
    }
  }

  return { header: first.fields, rows: rest.map((r) => r.fields) };
}

function splitRecords(text: string, separator: string): CsvRecord[] {
  const records: CsvRecord[] = [];
  let fields: string[] = [];
  let field = '';
  let quoted = false;
  let inQuotes = false;
  let line = 1;
  let recordLine = 1;

  const endRecord = (): void => {
    fields.push(field);
    // A bare empty line yields a single unquoted empty field
    if (!(fields.length === 1 && field === '' && !quoted)) {
      records.push({ fields, line: recordLine });
    }
    fields = [];
    field = '';
    quoted = false;
  };

  let i = 0;
  while (i < text.length) {
    const c = text.charAt(i);

    if (inQuotes) {
      if (c === '"') {
        if (text.charAt(i + 1) === '"') {
          field += '"';
          i += 2;
        } else {
          inQuotes = false;
          i += 1;
        }
        continue;
      }
      if (c === '\n') line += 1;
      field += c;
      i += 1;
      continue;
    }

    if (c === '"' && field === '' && !quoted) {
      inQuotes = true;
      quoted = true;
      i += 1;
    } else if (c === separator) {
      fields.push(field);
      field = '';
      quoted = false;
      i += 1;
    } else if (c === '\r' || c === '\n') {
      endRecord();
      i += c === '\r' && text.charAt(i + 1) === '\n' ? 2 : 1;
      line += 1;
      recordLine = line;
    } else {
      field += c;
      i += 1;
    }
  }

  if (inQuotes) {
    throw new CsvParseError('Unterminated quoted field', recordLine);
  }
  if (field !== '' || quoted || fields.length > 0) {
    endRecord();
  }

  return records;
}
