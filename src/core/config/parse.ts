import { readFileSync } from 'node:fs';
import { InvalidConfigurationError } from '../errors.js';
import {
  DEFAULT_HIGH_CARDINALITY_THRESHOLD,
  DEFAULT_ZERO_THRESHOLD,
  qualityConfigSchema,
} from './schema.js';
import type { QualityConfig, ResolvedQualityConfig } from './schema.js';

/**
 * Validate caller-supplied thresholds without applying defaults.
 * `undefined` and `null` stand for "no overrides".
 */
export function parseQualityConfig(input: unknown): QualityConfig {
  const result = qualityConfigSchema.safeParse(input ?? {});
  if (!result.success) {
    throw new InvalidConfigurationError(
      result.error.issues.map((issue) => ({
        path: issue.path.map(String).join('.'),
        message: issue.message,
      })),
    );
  }
  return result.data;
}

/**
 * Validate thresholds and fill in defaults.
 * Throws InvalidConfigurationError listing every offending key.
 */
export function resolveQualityConfig(input?: unknown): ResolvedQualityConfig {
  const config = parseQualityConfig(input);
  return {
    highCardinalityThreshold: config.highCardinalityThreshold ?? DEFAULT_HIGH_CARDINALITY_THRESHOLD,
    zeroThreshold: config.zeroThreshold ?? DEFAULT_ZERO_THRESHOLD,
  };
}

/**
 * Read thresholds from a JSON config file.
 * Malformed JSON is reported as InvalidConfigurationError, like a bad value.
 */
export function loadQualityConfigFile(filePath: string): QualityConfig {
  const content = readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'malformed JSON';
    throw new InvalidConfigurationError([{ path: '', message: detail }]);
  }
  return parseQualityConfig(raw);
}
