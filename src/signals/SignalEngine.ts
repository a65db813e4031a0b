/**
 * SignalEngine - current bid vs. estimated fair value → gated recommendation.
 *
 * Gates run in order and the first failure short-circuits to
 * INSUFFICIENT_DATA / GRAY with a reason.
 */

import {
  isResolved,
  type ItemAttributes,
  type PriceSnapshot,
  type Recommendation,
  type SignalResult,
  type TrafficLight,
} from '../core/types';

export const DEFAULT_MINIMUM_COMPARABLES = 3;
export const THIN_SAMPLE_BELOW = 6;
export const FULL_CONFIDENCE_AT = 10;
export const MAX_BID_FACTOR = 0.8;
export const SINGLE_PRICE_SPREAD = 0.2;

export const GRADE_MULTIPLIERS: ReadonlyMap<string, number> = new Map([
  ['PSA 10', 2.5],
  ['PSA 9', 1.8],
  ['PSA 8', 1.3],
  ['PSA 7', 1.0],
  ['PSA 6', 0.7],
  ['BGS 9.5', 2.2],
  ['BGS 9', 1.6],
  ['BGS 8.5', 1.2],
  ['BGS 8', 1.0],
  ['SGC 10', 2.0],
  ['SGC 9', 1.5],
  ['SGC 8', 1.1],
]);

const SIGNALS: Record<Recommendation, TrafficLight> = {
  STRONG_BUY: 'GREEN',
  BUY: 'GREEN',
  WEAK_BUY: 'YELLOW',
  WATCH: 'YELLOW',
  PASS: 'RED',
  INSUFFICIENT_DATA: 'GRAY',
};

const BASE_CONFIDENCE: Record<Recommendation, number> = {
  STRONG_BUY: 0.9,
  BUY: 0.7,
  WEAK_BUY: 0.5,
  WATCH: 0.3,
  PASS: 0.8,
  INSUFFICIENT_DATA: 0,
};

// Minimum roi% per recommendation, [normal, thin sample]
const ROI_LADDER: ReadonlyArray<{ recommendation: Recommendation; normal: number; thin: number }> = [
  { recommendation: 'STRONG_BUY', normal: 30, thin: 35 },
  { recommendation: 'BUY', normal: 15, thin: 20 },
  { recommendation: 'WEAK_BUY', normal: 5, thin: 5 },
  { recommendation: 'WATCH', normal: -10, thin: -15 },
];

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function normalizeGrade(grade: string): string {
  return grade.trim().toUpperCase().replace(/\s+/g, ' ');
}

export function gradeMultiplier(grade: string | null): number {
  if (!grade) return 1.0;
  return GRADE_MULTIPLIERS.get(normalizeGrade(grade)) ?? 1.0;
}

export function sampleStdDev(values: number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const squared = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function classify(roiPercent: number, count: number): Recommendation {
  const thin = count < THIN_SAMPLE_BELOW;
  for (const step of ROI_LADDER) {
    if (roiPercent >= (thin ? step.thin : step.normal)) {
      return step.recommendation;
    }
  }
  return 'PASS';
}

function insufficient(reason: string): SignalResult {
  return {
    recommendation: 'INSUFFICIENT_DATA',
    signal: SIGNALS.INSUFFICIENT_DATA,
    confidence: 0,
    reason,
    fairValue: null,
    fairValueRange: null,
    roiPercent: null,
    suggestedMaxBid: null,
    gradeMultiplier: null,
    keyFactors: [],
  };
}

export function keyFactors(identity: ItemAttributes, count: number, roiPercent: number): string[] {
  const factors: string[] = [];

  if (count >= 10) {
    factors.push('Strong market data available');
  } else if (count >= 5) {
    factors.push('Moderate market data available');
  } else {
    factors.push('Limited market data - higher risk');
  }

  if (roiPercent > 25) {
    factors.push('Excellent profit potential');
  } else if (roiPercent > 10) {
    factors.push('Good profit potential');
  } else if (roiPercent > 0) {
    factors.push('Modest profit potential');
  } else {
    factors.push('Currently above market value');
  }

  const grade = identity.grade ? normalizeGrade(identity.grade) : null;
  if (grade === 'PSA 10' || grade === 'BGS 9.5') {
    factors.push('Premium grade - strong demand');
  } else if (grade === 'PSA 9' || grade === 'BGS 9') {
    factors.push('High grade - good demand');
  } else if (grade) {
    factors.push(`Graded card - ${grade}`);
  } else {
    factors.push('Ungraded - condition risk');
  }

  if (identity.rookie) {
    factors.push('Rookie card - higher collectibility');
  }

  return factors;
}

export class SignalEngine {
  constructor(private readonly minimumComparables: number = DEFAULT_MINIMUM_COMPARABLES) {}

  score(identity: ItemAttributes, currentBid: number, snapshot: PriceSnapshot): SignalResult {
    if (!isResolved(identity)) {
      return insufficient('item not identified');
    }
    if (!(currentBid > 0)) {
      return insufficient('no active bid detected');
    }
    if (snapshot.count === 0 || snapshot.prices.length === 0) {
      return insufficient('no market data');
    }
    if (snapshot.count < this.minimumComparables) {
      return insufficient(
        `only ${snapshot.count} comparable sale(s), need ${this.minimumComparables}`
      );
    }

    const prices = snapshot.prices;
    const mean = prices.reduce((sum, p) => sum + p, 0) / prices.length;
    const multiplier = gradeMultiplier(identity.grade);
    const fairValue = mean * multiplier;
    const spread = prices.length > 1 ? sampleStdDev(prices) : mean * SINGLE_PRICE_SPREAD;
    const roiPercent = ((fairValue - currentBid) / currentBid) * 100;

    const recommendation = classify(roiPercent, snapshot.count);
    const confidence =
      BASE_CONFIDENCE[recommendation] * Math.min(1, snapshot.count / FULL_CONFIDENCE_AT);

    return {
      recommendation,
      signal: SIGNALS[recommendation],
      confidence: round2(confidence),
      reason: null,
      fairValue: round2(fairValue),
      fairValueRange: {
        low: round2(Math.max(0, (mean - spread) * multiplier)),
        high: round2((mean + spread) * multiplier),
      },
      roiPercent: round2(roiPercent),
      suggestedMaxBid: round2(fairValue * MAX_BID_FACTOR),
      gradeMultiplier: multiplier,
      keyFactors: keyFactors(identity, snapshot.count, roiPercent),
    };
  }
}
