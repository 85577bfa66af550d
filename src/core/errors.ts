/** A single configuration problem, addressed by its key path. */
export interface ConfigIssue {
  readonly path: string;
  readonly message: string;
}

/**
 * Thrown when quality thresholds are malformed: negative, non-numeric,
 * or unknown keys. Raised before any part of the table is scanned.
 */
export class InvalidConfigurationError extends Error {
  readonly issues: readonly ConfigIssue[];

  constructor(issues: readonly ConfigIssue[]) {
    const detail = issues.map((i) => (i.path !== '' ? `${i.path}: ${i.message}` : i.message)).join('; ');
    super(`Invalid configuration: ${detail}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

/** Thrown when columns handed to the table builder differ in length. */
export class TableShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TableShapeError';
  }
}

/** Thrown when CSV text cannot be split into a rectangular grid. */
export class CsvParseError extends Error {
  readonly line: number;

  constructor(message: string, line: number) {
    super(`${message} (line ${String(line)})`);
    this.name = 'CsvParseError';
    this.line = line;
  }
}
