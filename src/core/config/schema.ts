import { z } from 'zod/v4';

/** Default maximum distinct values for a categorical column. */
export const DEFAULT_HIGH_CARDINALITY_THRESHOLD = 100;

/** Default maximum share of exact zeros in a numeric column. */
export const DEFAULT_ZERO_THRESHOLD = 0.5;

/**
 * Zod schema for quality thresholds. Every key is optional; unknown keys
 * are rejected so that typos do not silently fall back to defaults.
 */
export const qualityConfigSchema = z.strictObject({
  highCardinalityThreshold: z.number().nonnegative().optional(),
  zeroThreshold: z.number().nonnegative().optional(),
});

/** Thresholds as supplied by a caller. */
export type QualityConfig = z.infer<typeof qualityConfigSchema>;

/** Thresholds with defaults applied. */
export interface ResolvedQualityConfig {
  readonly highCardinalityThreshold: number;
  readonly zeroThreshold: number;
}
