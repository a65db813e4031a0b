import type { SpokenAttributes } from '../core/types';
import { parseGrade, parseRookie, parseSet, parseYear } from '../recognition/attributes';

const SPOKEN_PRICE_PATTERN = /\$?\b(\d{1,4}(?:\.\d{2})?)\b/g;
const YEAR_LIKE = /^(19|20)\d{2}$/;

const WEIGHTS = {
  grade: 0.4,
  year: 0.2,
  set: 0.2,
  spokenPrice: 0.2,
} as const;

/** First number in the transcript that is not a 19xx/20xx year. */
export function parseSpokenPrice(transcript: string): number | null {
  for (const match of transcript.matchAll(SPOKEN_PRICE_PATTERN)) {
    if (YEAR_LIKE.test(match[1])) continue;
    return Number.parseFloat(match[1]);
  }
  return null;
}

export function parseSpokenAttributes(transcript: string): SpokenAttributes {
  const grade = parseGrade(transcript);
  return {
    grade: grade?.grade ?? null,
    gradingCompany: grade?.gradingCompany ?? null,
    year: parseYear(transcript),
    set: parseSet(transcript),
    rookie: parseRookie(transcript),
    spokenPrice: parseSpokenPrice(transcript),
  };
}

export function spokenConfidence(attributes: SpokenAttributes): number {
  let score = 0;
  if (attributes.grade) score += WEIGHTS.grade;
  if (attributes.year) score += WEIGHTS.year;
  if (attributes.set) score += WEIGHTS.set;
  if (attributes.spokenPrice !== null) score += WEIGHTS.spokenPrice;
  // one decimal keeps sums like 0.4 + 0.2 exact
  return Math.min(1, Math.round(score * 10) / 10);
}
