import type { SoldListing } from '../core/types';

export const DEFAULT_SIMILARITY_THRESHOLD = 60;

function sortedTokens(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .filter(Boolean)
    .sort()
    .join(' ');
}

/** Edit distance where a substitution costs 2 (one deletion plus one insertion). */
function indelDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, j) => j);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = a[i - 1] === b[j - 1] ? 0 : 2;
      current[j] = Math.min(current[j - 1] + 1, previous[j] + 1, previous[j - 1] + substitution);
    }
    previous = current;
  }
  return previous[b.length];
}

/** 0..100 similarity of two strings. */
export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return Math.round((100 * (total - indelDistance(a, b))) / total);
}

/** Similarity that ignores word order and punctuation. */
export function tokenSortRatio(a: string, b: string): number {
  return ratio(sortedTokens(a), sortedTokens(b));
}

export interface FilterResult {
  kept: SoldListing[];
  /** False when the filter would have dropped every listing and was skipped. */
  filtered: boolean;
  rejected: number;
}

export function filterBySimilarity(
  listings: SoldListing[],
  query: string,
  threshold: number = DEFAULT_SIMILARITY_THRESHOLD
): FilterResult {
  if (listings.length === 0) {
    return { kept: [], filtered: false, rejected: 0 };
  }

  const kept = listings.filter((listing) => tokenSortRatio(listing.title, query) >= threshold);
  if (kept.length === 0) {
    return { kept: listings, filtered: false, rejected: 0 };
  }
  return { kept, filtered: true, rejected: listings.length - kept.length };
}
