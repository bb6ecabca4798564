import type { QualityReport } from '../types/index.js';
import { isRecord } from '../utils/guards.js';

function isMissing(value: unknown): boolean {
  return value === null || value === undefined || value === '';
}

/**
 * Collect every dotted field path that is null/empty anywhere inside `item`.
 * List elements share their parent's path.
 */
export function missingPaths(item: unknown): Set<string> {
  const missing = new Set<string>();

  const walk = (node: unknown, prefix: string): void => {
    if (Array.isArray(node)) {
      for (const element of node) {
        walk(element, prefix);
      }
      return;
    }
    if (!isRecord(node)) return;

    for (const [key, value] of Object.entries(node)) {
      const path = prefix ? `${prefix}.${key}` : key;
      if (isMissing(value)) {
        missing.add(path);
      } else if (Array.isArray(value) || isRecord(value)) {
        walk(value, path);
      }
    }
  };

  walk(item, '');
  return missing;
}

export function roundRate(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function emptyQualityReport(): QualityReport {
  return { totalItems: 0, completeItems: 0, completionRate: 0, missingFields: [], errors: [] };
}

export function analyzeQuality(items: readonly unknown[]): QualityReport {
  if (items.length === 0) {
    return emptyQualityReport();
  }

  const missingCounts = new Map<string, number>();
  let completeItems = 0;

  for (const item of items) {
    const paths = missingPaths(item);
    if (paths.size === 0) {
      completeItems++;
      continue;
    }
    for (const path of paths) {
      missingCounts.set(path, (missingCounts.get(path) ?? 0) + 1);
    }
  }

  return {
    totalItems: items.length,
    completeItems,
    completionRate: roundRate(completeItems / items.length),
    missingFields: Array.from(missingCounts, ([path, count]) => `${path}: ${count} items`),
    errors: [],
  };
}
