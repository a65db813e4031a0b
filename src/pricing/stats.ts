import type { PriceSnapshot, SnapshotSource, SoldListing } from '../core/types';

export const RETAINED_PRICES = 10;

export interface SnapshotMeta {
  query: string;
  cachedAt: string;
  filtered: boolean;
  broadened: boolean;
  source: SnapshotSource;
}

export function emptySnapshot(meta: SnapshotMeta): PriceSnapshot {
  return {
    count: 0,
    prices: [],
    mean: 0,
    median: 0,
    min: 0,
    max: 0,
    stdDev: 0,
    ...meta,
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function median(sorted: number[]): number {
  if (sorted.length === 0) return 0;
  const mid = Math.floor(sorted.length / 2);
  return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

/**
 * Aggregate comparables (most recent first). `prices` keeps the ten most recent,
 * sorted ascending; every other statistic covers all of them.
 */
export function summarize(listings: SoldListing[], meta: SnapshotMeta): PriceSnapshot {
  const all = listings.map((l) => l.price).filter((p) => Number.isFinite(p) && p > 0);
  if (all.length === 0) {
    return emptySnapshot(meta);
  }

  const sorted = [...all].sort((a, b) => a - b);
  const mean = all.reduce((sum, p) => sum + p, 0) / all.length;
  const variance = all.reduce((sum, p) => sum + (p - mean) ** 2, 0) / all.length;

  return {
    count: all.length,
    prices: all.slice(0, RETAINED_PRICES).sort((a, b) => a - b),
    mean: round2(mean),
    median: round2(median(sorted)),
    min: sorted[0],
    max: sorted[sorted.length - 1],
    stdDev: round2(Math.sqrt(variance)),
    ...meta,
  };
}
