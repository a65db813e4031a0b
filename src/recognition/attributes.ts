/**
 * Regex/keyword extraction of card attributes from free text.
 * Shared by the on-screen and spoken channels.
 */

import { emptyAttributes, type AuctionInfo, type ItemAttributes } from '../core/types';

export const KNOWN_SETS = [
  'topps',
  'panini',
  'upper deck',
  'fleer',
  'donruss',
  'bowman',
  'prizm',
  'select',
  'optic',
  'mosaic',
  'chronicles',
] as const;

const YEAR_PATTERN = /\b(19[5-9]\d|20[0-2]\d)\b/;
const GRADE_PATTERN = /\b(PSA|BGS|SGC)\s*(\d+(?:\.\d)?)\b/i;
const ITEM_NUMBER_PATTERN = /#\s?([A-Za-z0-9][A-Za-z0-9-]*)/;
const ROOKIE_PATTERN = /\b(?:rookie card|rookie|rc)\b/i;

// Lookaheads so candidates may overlap ("Topps Mike Trout" yields "Mike Trout" too)
const FULL_NAME_PATTERN = /(?=\b([A-Z][a-z]+\s+[A-Z][a-z]+)\b)/g;
const INITIAL_NAME_PATTERN = /(?=\b([A-Z]\.\s*[A-Z][a-z]+)\b)/g;

const NAME_STOPWORDS = new Set([
  'psa',
  'bgs',
  'sgc',
  'card',
  'cards',
  'lot',
  'bid',
  'bids',
  'time',
  'rookie',
  'auction',
  'starting',
  'current',
  'ends',
  'upper',
  'deck',
  ...KNOWN_SETS,
]);

const BID_PATTERN = /\$(\d+(?:,\d{3})*(?:\.\d{2})?)/;
const TIME_REMAINING_PATTERN = /\b(\d+[hm]|\d+:\d{2})\b/;
const BID_COUNT_PATTERN = /(\d+)\s*bids?\b/i;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function parseYear(text: string): string | null {
  return YEAR_PATTERN.exec(text)?.[1] ?? null;
}

export function parseGrade(text: string): { grade: string; gradingCompany: string } | null {
  const match = GRADE_PATTERN.exec(text);
  if (!match) return null;
  const gradingCompany = match[1].toUpperCase();
  return { grade: `${gradingCompany} ${match[2]}`, gradingCompany };
}

export function parseItemNumber(text: string): string | null {
  return ITEM_NUMBER_PATTERN.exec(text)?.[1] ?? null;
}

export function parseRookie(text: string): boolean {
  return ROOKIE_PATTERN.test(text);
}

/**
 * First known set present in the text, widened to the whole word it sits in
 * so brand qualifiers survive ("ToppsChrome").
 */
export function parseSet(text: string): string | null {
  const lower = text.toLowerCase();
  for (const set of KNOWN_SETS) {
    const at = lower.indexOf(set);
    if (at === -1) continue;

    const context = text.slice(Math.max(0, at - 20), at + set.length + 20);
    const expanded = new RegExp(`\\b\\w*${escapeRegExp(set)}\\w*\\b`, 'i').exec(context);
    return expanded ? expanded[0] : set;
  }
  return null;
}

function isNameCandidate(candidate: string): boolean {
  return candidate
    .toLowerCase()
    .split(/[\s.]+/)
    .filter(Boolean)
    .every((word) => !NAME_STOPWORDS.has(word));
}

export function parseName(text: string): string | null {
  for (const pattern of [FULL_NAME_PATTERN, INITIAL_NAME_PATTERN]) {
    for (const match of text.matchAll(pattern)) {
      const candidate = match[1].replace(/\s+/g, ' ');
      if (isNameCandidate(candidate)) {
        return candidate;
      }
    }
  }
  return null;
}

export function parseItemAttributes(text: string): ItemAttributes {
  if (!text.trim()) return emptyAttributes();

  const grade = parseGrade(text);
  return {
    name: parseName(text),
    year: parseYear(text),
    set: parseSet(text),
    itemNumber: parseItemNumber(text),
    grade: grade?.grade ?? null,
    gradingCompany: grade?.gradingCompany ?? null,
    rookie: parseRookie(text),
  };
}

/**
 * Current bid, countdown and bid count from the auction overlay text.
 */
export function parseAuctionInfo(text: string): AuctionInfo {
  const bid = BID_PATTERN.exec(text);
  const time = TIME_REMAINING_PATTERN.exec(text);
  const count = BID_COUNT_PATTERN.exec(text);

  return {
    currentBid: bid ? Number.parseFloat(bid[1].replace(/,/g, '')) : 0,
    timeRemaining: time ? time[1] : null,
    bidCount: count ? Number.parseInt(count[1], 10) : null,
  };
}
