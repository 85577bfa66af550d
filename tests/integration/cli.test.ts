import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { main } from '../../src/cli.js';

const CSV_DIR = fileURLToPath(new URL('../fixtures/csv/', import.meta.url));
const CONFIG_DIR = fileURLToPath(new URL('../fixtures/config/', import.meta.url));

const SAMPLE_CSV = join(CSV_DIR, 'sample.csv');
const ISSUES_CSV = join(CSV_DIR, 'quality-issues.csv');
const RAGGED_CSV = join(CSV_DIR, 'ragged.csv');
const SEMICOLON_CSV = join(CSV_DIR, 'semicolon.csv');
const STRICT_CONFIG = join(CONFIG_DIR, 'strict.json');
const NEGATIVE_CONFIG = join(CONFIG_DIR, 'negative.json');

describe('CLI', () => {
  let stdoutOutput: string;
  let stderrOutput: string;
  const tmpDirs: string[] = [];

  beforeEach(() => {
    stdoutOutput = '';
    stderrOutput = '';
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdoutOutput += String(chunk);
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderrOutput += String(chunk);
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    for (const dir of tmpDirs) {
      rmSync(dir, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  function makeTmpDir(): string {
    const dir = mkdtempSync(join(tmpdir(), 'eda-cli-'));
    tmpDirs.push(dir);
    return dir;
  }

  describe('--help', () => {
    it('prints usage and returns 0', () => {
      const code = main(['--help']);
      expect(code).toBe(0);
      expect(stdoutOutput).toContain('Usage: eda-cli <command> <csv> [options]');
      expect(stdoutOutput).toContain('--zero-threshold');
      expect(stdoutOutput).toContain('--min-score');
    });
  });

  describe('argument validation', () => {
    it('rejects unknown flags with exit code 2', () => {
      const code = main(['overview', SAMPLE_CSV, '--unknown-flag']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Use --help for usage');
    });

    it('requires a command', () => {
      const code = main([]);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Missing command');
    });

    it('rejects an unknown command', () => {
      const code = main(['describe', SAMPLE_CSV]);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Unknown command "describe"');
    });

    it('requires exactly one CSV path', () => {
      const code = main(['overview']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('"overview" takes exactly one CSV path');
    });

    it('rejects a nonexistent CSV path', () => {
      const code = main(['overview', '/nonexistent/data.csv']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('CSV file not found');
    });

    it('rejects an invalid --format value', () => {
      const code = main(['overview', SAMPLE_CSV, '--format', 'xml']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Invalid format "xml"');
    });

    it('rejects an unknown encoding', () => {
      const code = main(['overview', SAMPLE_CSV, '--encoding', 'klingon']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Unknown encoding "klingon"');
    });

    it('rejects a non-numeric threshold', () => {
      const code = main(['overview', SAMPLE_CSV, '--high-cardinality-threshold', 'many']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Invalid --high-cardinality-threshold value "many". Must be a number.');
    });

    it('rejects a negative threshold as invalid configuration', () => {
      const code = main(['overview', SAMPLE_CSV, '--zero-threshold=-1']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Invalid configuration: zeroThreshold');
    });

    it('rejects a non-positive --top-k-categories', () => {
      const code = main(['report', SAMPLE_CSV, '--top-k-categories', '0']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Must be a positive integer');
    });
  });

  describe('overview', () => {
    it('prints a text overview by default', () => {
      const code = main(['overview', SAMPLE_CSV, '--no-timestamp']);
      expect(code).toBe(0);
      expect(stdoutOutput).toContain('=== EDA Overview ===');
      expect(stdoutOutput).toContain('Rows:      4');
      expect(stdoutOutput).toContain('  [x] Missing values');
      expect(stdoutOutput).not.toContain('Timestamp:');
    });

    it('prints JSON with --format json', () => {
      const code = main(['overview', SAMPLE_CSV, '--format', 'json', '--no-timestamp']);
      expect(code).toBe(0);

      const parsed = JSON.parse(stdoutOutput.trim());
      expect(parsed.metadata.timestamp).toBeNull();
      expect(parsed.metadata.rowCount).toBe(4);
      expect(parsed.quality.flags.hasMissing).toBe(true);
      expect(parsed.quality.metrics.missingShares).toEqual({ age: 0.25, city: 0.25, height: 0 });
    });

    it('rejects a quote as --sep with exit code 2', () => {
      const code = main(['overview', SAMPLE_CSV, '--sep', '"']);
      expect(code).toBe(2);
      expect(stderrOutput).toBe(
        'Error: Invalid --sep value """. Must be a single character other than a quote or newline.\n',
      );
    });

    it('honours --sep', () => {
      const code = main(['overview', SEMICOLON_CSV, '--sep', ';', '--format', 'json']);
      expect(code).toBe(0);

      const parsed = JSON.parse(stdoutOutput.trim());
      expect(parsed.metadata.columnCount).toBe(3);
      expect(parsed.summary.columns.map((c: { kind: string }) => c.kind)).toEqual([
        'numeric',
        'categorical',
        'other',
      ]);
    });

    it('writes output to a file with --out', () => {
      const outPath = join(makeTmpDir(), 'overview.json');
      const code = main(['overview', SAMPLE_CSV, '--format', 'json', '--out', outPath]);
      expect(code).toBe(0);
      expect(stdoutOutput).toBe('');
      expect(JSON.parse(readFileSync(outPath, 'utf-8')).metadata.rowCount).toBe(4);
    });

    it('returns 3 when the CSV cannot be parsed', () => {
      const code = main(['overview', RAGGED_CSV]);
      expect(code).toBe(3);
      expect(stderrOutput).toContain('Failed to read CSV. Expected 2 fields but found 1 (line 3)');
    });
  });

  describe('thresholds', () => {
    it('reads thresholds from --config', () => {
      const code = main(['overview', ISSUES_CSV, '--config', STRICT_CONFIG, '--format', 'json']);
      expect(code).toBe(0);

      const parsed = JSON.parse(stdoutOutput.trim());
      expect(parsed.quality.config).toEqual({ highCardinalityThreshold: 1, zeroThreshold: 0.9 });
      expect(parsed.quality.flags.hasHighCardinalityCategories).toBe(true);
      expect(parsed.quality.flags.hasManyZeroValues).toBe(false);
    });

    it('lets command-line flags override the config file', () => {
      const code = main([
        'overview', ISSUES_CSV,
        '--config', STRICT_CONFIG,
        '--zero-threshold', '0.5',
        '--format', 'json',
      ]);
      expect(code).toBe(0);

      const parsed = JSON.parse(stdoutOutput.trim());
      expect(parsed.quality.config).toEqual({ highCardinalityThreshold: 1, zeroThreshold: 0.5 });
      expect(parsed.quality.flags.hasManyZeroValues).toBe(true);
    });

    it('rejects an invalid config file with exit code 2', () => {
      const code = main(['overview', SAMPLE_CSV, '--config', NEGATIVE_CONFIG]);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Invalid configuration: zeroThreshold');
    });

    it('rejects a nonexistent config file', () => {
      const code = main(['overview', SAMPLE_CSV, '--config', '/nonexistent/config.json']);
      expect(code).toBe(2);
      expect(stderrOutput).toContain('Config file not found');
    });
  });

  describe('--min-score', () => {
    it('returns 1 when the score is below the minimum', () => {
      const code = main(['overview', ISSUES_CSV, '--min-score', '0.9']);
      expect(code).toBe(1);
      expect(stderrOutput).toContain('Quality score 0.55 is below --min-score 0.9');
    });

    it('returns 0 when the score meets the minimum', () => {
      const code = main(['overview', ISSUES_CSV, '--min-score', '0.5']);
      expect(code).toBe(0);
    });
  });

  describe('report', () => {
    it('writes the report directory', () => {
      const outDir = makeTmpDir();
      const code = main(['report', SAMPLE_CSV, '--out-dir', outDir, '--title', 'Sample', '--no-timestamp']);
      expect(code).toBe(0);
      expect(stdoutOutput).toContain(`Report written to ${outDir}`);
      expect(existsSync(join(outDir, 'summary.csv'))).toBe(true);
      expect(existsSync(join(outDir, 'missing.csv'))).toBe(true);
      expect(existsSync(join(outDir, 'top_categories', 'city.csv'))).toBe(true);
      expect(readFileSync(join(outDir, 'report.md'), 'utf-8').split('\n')[0]).toBe('# Sample');
    });

    it('highlights columns using --min-missing-share', () => {
      const outDir = makeTmpDir();
      const code = main(['report', SAMPLE_CSV, '--out-dir', outDir, '--min-missing-share', '0.5']);
      expect(code).toBe(0);
      const markdown = readFileSync(join(outDir, 'report.md'), 'utf-8');
      expect(markdown).toContain('## Columns with missing share >= 50.00%\n\nNone.\n');
    });
  });
});
