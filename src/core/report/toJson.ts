import type { QualityReport } from '../analysis/qualityTypes.js';
import type { EdaResult } from './reportTypes.js';

/**
 * Serialize a result or a bare quality report to a deterministic JSON string.
 * Keys are sorted for stable diffing.
 */
export function toJson(result: EdaResult | QualityReport, pretty: boolean): string {
  const sorted = sortKeysDeep(result);
  return pretty
    ? JSON.stringify(sorted, null, 2)
    : JSON.stringify(sorted);
}

/**
 * Recursively sort object keys for deterministic output. Every object is
 * sorted, data-keyed maps included: `metrics.missingShares` comes out in
 * column-name order, not table order. Arrays keep their order.
 */
export function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return Object.fromEntries(entries.map(([key, inner]) => [key, sortKeysDeep(inner)]));
  }
  return value;
}
