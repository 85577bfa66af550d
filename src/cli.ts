#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { existsSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { explore, writeReport } from './index.js';
import { InvalidConfigurationError } from './core/errors.js';
import { loadQualityConfigFile } from './core/config/parse.js';
import { parseNumber } from './core/table/fromRows.js';
import { isValidSeparator } from './core/table/parseCsv.js';
import { toJson } from './core/report/toJson.js';
import { toText } from './core/report/toText.js';
import { DEFAULT_MIN_MISSING_SHARE, DEFAULT_REPORT_TITLE } from './core/report/toMarkdown.js';
import type { QualityConfig } from './core/config/schema.js';
import type { EdaResult, OutputFormat } from './core/report/reportTypes.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_LOW_QUALITY = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_LOAD_ERROR = 3;

const OPTIONS = {
  sep: { type: 'string', default: ',' },
  encoding: { type: 'string', default: 'utf-8' },
  format: { type: 'string', default: 'text' },
  pretty: { type: 'boolean', default: false },
  out: { type: 'string' },
  config: { type: 'string' },
  'high-cardinality-threshold': { type: 'string' },
  'zero-threshold': { type: 'string' },
  'min-score': { type: 'string' },
  'no-timestamp': { type: 'boolean', default: false },
  'out-dir': { type: 'string', default: 'reports' },
  title: { type: 'string', default: DEFAULT_REPORT_TITLE },
  'top-k-categories': { type: 'string', default: '5' },
  'max-category-columns': { type: 'string', default: '5' },
  'min-missing-share': { type: 'string', default: String(DEFAULT_MIN_MISSING_SHARE) },
  help: { type: 'boolean', default: false },
} as const;

function printUsage(): void {
  process.stdout.write(
    `Usage: eda-cli <command> <csv> [options]

Commands:
  overview <csv>                  Print dataset summary and quality flags
  report <csv>                    Write a Markdown report with CSV tables

Options:
  --sep <char>                    CSV separator (default: ,; use \\t for tab)
  --encoding <name>               File encoding (default: utf-8)
  --config <path>                 JSON file with quality thresholds
  --high-cardinality-threshold <n>
                                  Max distinct values per categorical column (default: 100)
  --zero-threshold <n>            Max share of zeros per numeric column (default: 0.5)
  --min-score <n>                 Exit 1 if the quality score is below n
  --no-timestamp                  Omit timestamp from output
  --help                          Show this help message

overview options:
  --format <fmt>                  Output format: text | json (default: text)
  --pretty                        Pretty-print JSON output
  --out <path>                    Write output to file instead of stdout

report options:
  --out-dir <path>                Report directory (default: reports)
  --title <text>                  Report title (default: ${DEFAULT_REPORT_TITLE})
  --top-k-categories <n>          Values listed per categorical column (default: 5)
  --max-category-columns <n>      Categorical columns listed (default: 5)
  --min-missing-share <n>         Highlight columns at or above this missing share (default: ${String(DEFAULT_MIN_MISSING_SHARE)})
`,
  );
}

function parseCliArgs(argv: string[] | undefined) {
  return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
}

/** Thrown for invalid command-line input; mapped to EXIT_CLI_ERROR. */
class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function numberOption(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = parseNumber(raw);
  if (value === null) {
    throw new UsageError(`Invalid --${name} value "${raw}". Must be a number.`);
  }
  return value;
}

function countOption(name: string, raw: string): number {
  const value = numberOption(name, raw);
  if (value === undefined || !Number.isInteger(value) || value < 1) {
    throw new UsageError(`Invalid --${name} value "${raw}". Must be a positive integer.`);
  }
  return value;
}

export function main(argv?: string[]): number {
  let args: ReturnType<typeof parseCliArgs>;

  try {
    args = parseCliArgs(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values.help === true) {
    printUsage();
    return EXIT_OK;
  }

  const positionals: readonly string[] = args.positionals;
  const [command, csvArg, ...extra] = positionals;
  if (command === undefined) {
    process.stderr.write('Error: Missing command. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }
  if (command !== 'overview' && command !== 'report') {
    process.stderr.write(`Error: Unknown command "${command}". Must be "overview" or "report".\n`);
    return EXIT_CLI_ERROR;
  }
  if (csvArg === undefined || extra.length > 0) {
    process.stderr.write(`Error: "${command}" takes exactly one CSV path. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  const csvPath = resolve(csvArg);
  if (!existsSync(csvPath)) {
    process.stderr.write(`Error: CSV file not found: ${csvPath}\n`);
    return EXIT_CLI_ERROR;
  }

  // Validate format
  const format = args.values.format ?? 'text';
  if (format !== 'json' && format !== 'text') {
    process.stderr.write(`Error: Invalid format "${format}". Must be "json" or "text".\n`);
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;

  const encoding = args.values.encoding ?? 'utf-8';
  if (!Buffer.isEncoding(encoding)) {
    process.stderr.write(`Error: Unknown encoding "${encoding}".\n`);
    return EXIT_CLI_ERROR;
  }

  const rawSep = args.values.sep ?? ',';
  const separator = rawSep === '\\t' ? '\t' : rawSep;
  if (!isValidSeparator(separator)) {
    process.stderr.write(
      `Error: Invalid --sep value "${rawSep}". Must be a single character other than a quote or newline.\n`,
    );
    return EXIT_CLI_ERROR;
  }

  let quality: QualityConfig;
  let minScore: number | undefined;
  let topK: number;
  let maxCategoryColumns: number;
  let minMissingShare: number;
  try {
    quality = buildQualityConfig(args.values);
    minScore = numberOption('min-score', args.values['min-score']);
    topK = countOption('top-k-categories', args.values['top-k-categories'] ?? '5');
    maxCategoryColumns = countOption('max-category-columns', args.values['max-category-columns'] ?? '5');
    minMissingShare =
      numberOption('min-missing-share', args.values['min-missing-share']) ?? DEFAULT_MIN_MISSING_SHARE;
  } catch (error: unknown) {
    if (error instanceof UsageError || error instanceof InvalidConfigurationError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return EXIT_CLI_ERROR;
    }
    throw error;
  }

  let result: EdaResult;
  try {
    result = explore({
      csvPath,
      separator,
      encoding,
      quality,
      noTimestamp: args.values['no-timestamp'] === true,
      topK,
      maxCategoryColumns,
    });
  } catch (error: unknown) {
    if (error instanceof InvalidConfigurationError) {
      process.stderr.write(`Error: ${error.message}\n`);
      return EXIT_CLI_ERROR;
    }
    const detail = error instanceof Error ? error.message : '';
    process.stderr.write(`Error: Failed to read CSV.${detail !== '' ? ` ${detail}` : ''}\n`);
    return EXIT_LOAD_ERROR;
  }

  if (command === 'overview') {
    const output = outputFormat === 'json' ? toJson(result, args.values.pretty === true) : toText(result);
    const outPath = args.values.out;
    if (outPath !== undefined) {
      writeFileSync(resolve(outPath), output, 'utf-8');
    } else {
      process.stdout.write(output);
      process.stdout.write('\n');
    }
  } else {
    const outDir = resolve(args.values['out-dir'] ?? 'reports');
    const written = writeReport(outDir, result, {
      title: args.values.title ?? DEFAULT_REPORT_TITLE,
      minMissingShare,
    });
    process.stdout.write(`Report written to ${outDir}\n`);
    for (const path of written) {
      process.stdout.write(`- ${path}\n`);
    }
  }

  if (minScore !== undefined && result.quality.qualityScore < minScore) {
    process.stderr.write(
      `Quality score ${result.quality.qualityScore.toFixed(2)} is below --min-score ${String(minScore)}\n`,
    );
    return EXIT_LOW_QUALITY;
  }

  return EXIT_OK;
}

/**
 * Merge thresholds: command-line flags override the config file,
 * which overrides the built-in defaults.
 */
function buildQualityConfig(values: ReturnType<typeof parseCliArgs>['values']): QualityConfig {
  const configArg = values.config;
  let fileConfig: QualityConfig = {};
  if (configArg !== undefined) {
    const configPath = resolve(configArg);
    if (!existsSync(configPath)) {
      throw new UsageError(`Config file not found: ${configPath}`);
    }
    fileConfig = loadQualityConfigFile(configPath);
  }

  const highCardinality = numberOption('high-cardinality-threshold', values['high-cardinality-threshold']);
  const zero = numberOption('zero-threshold', values['zero-threshold']);
  return {
    ...fileConfig,
    ...(highCardinality !== undefined ? { highCardinalityThreshold: highCardinality } : {}),
    ...(zero !== undefined ? { zeroThreshold: zero } : {}),
  };
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  try {
    process.exitCode = main();
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Error: ${detail}\n`);
    process.exitCode = EXIT_LOAD_ERROR;
  }
}
