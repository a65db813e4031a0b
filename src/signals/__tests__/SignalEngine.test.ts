import { emptyAttributes, type ItemAttributes, type PriceSnapshot } from '../../core/types';
import { emptySnapshot } from '../../pricing/stats';
import { SignalEngine, classify, gradeMultiplier, keyFactors, sampleStdDev } from '../SignalEngine';

const TROUT: ItemAttributes = {
  ...emptyAttributes(),
  name: 'Mike Trout',
  year: '2023',
  set: 'Topps',
  grade: 'PSA 10',
  gradingCompany: 'PSA',
};

function snapshot(prices: number[], count: number = prices.length): PriceSnapshot {
  const base = emptySnapshot({
    query: 'Mike Trout 2023 Topps PSA 10',
    cachedAt: '2026-01-01T00:00:00.000Z',
    filtered: true,
    broadened: false,
    source: 'live',
  });
  return { ...base, count, prices: [...prices].sort((a, b) => a - b) };
}

const TEN_PRICES = [30, 32, 35, 38, 40, 42, 45, 50, 55, 60];

describe('gradeMultiplier', () => {
  test('should look up grades case- and space-insensitively', () => {
    expect(gradeMultiplier('psa  10')).toBe(2.5);
    expect(gradeMultiplier('BGS 9.5')).toBe(2.2);
  });

  test('should default to 1 for unknown or missing grades', () => {
    expect(gradeMultiplier('CGC 9.5')).toBe(1);
    expect(gradeMultiplier(null)).toBe(1);
  });
});

describe('sampleStdDev', () => {
  test('should use the n-1 denominator', () => {
    expect(sampleStdDev([2, 4, 4, 4, 5, 5, 7, 9])).toBeCloseTo(2.138, 3);
    expect(sampleStdDev([5])).toBe(0);
  });
});

describe('classify', () => {
  test('should require more headroom on a thin sample', () => {
    expect(classify(32, 6)).toBe('STRONG_BUY');
    expect(classify(32, 5)).toBe('BUY');
  });

  test('should widen the watch band on a thin sample', () => {
    expect(classify(-11, 10)).toBe('PASS');
    expect(classify(-11, 5)).toBe('WATCH');
    expect(classify(-16, 5)).toBe('PASS');
  });

  test('should treat thresholds as inclusive', () => {
    expect(classify(30, 10)).toBe('STRONG_BUY');
    expect(classify(5, 10)).toBe('WEAK_BUY');
    expect(classify(-10, 10)).toBe('WATCH');
  });
});

describe('keyFactors', () => {
  test('should mention rookie cards', () => {
    expect(keyFactors({ ...TROUT, grade: 'PSA 9', rookie: true }, 7, 12)).toEqual([
      'Moderate market data available',
      'Good profit potential',
      'High grade - good demand',
      'Rookie card - higher collectibility',
    ]);
  });

  test('should name other grades and flag overpriced bids', () => {
    expect(keyFactors({ ...TROUT, grade: 'SGC 8' }, 3, -4)).toEqual([
      'Limited market data - higher risk',
      'Currently above market value',
      'Graded card - SGC 8',
    ]);
  });
});

describe('SignalEngine', () => {
  const engine = new SignalEngine(3);

  test('should score a deep, well-priced sample as a strong buy', () => {
    const result = engine.score(TROUT, 40, snapshot(TEN_PRICES, 12));

    expect(result).toEqual({
      recommendation: 'STRONG_BUY',
      signal: 'GREEN',
      confidence: 0.9,
      reason: null,
      fairValue: 106.75,
      fairValueRange: { low: 82.11, high: 131.39 },
      roiPercent: 166.88,
      suggestedMaxBid: 85.4,
      gradeMultiplier: 2.5,
      keyFactors: ['Strong market data available', 'Excellent profit potential', 'Premium grade - strong demand'],
    });
  });

  test('should refuse to score an unidentified item', () => {
    const result = engine.score(emptyAttributes(), 40, snapshot(TEN_PRICES));

    expect(result).toMatchObject({ recommendation: 'INSUFFICIENT_DATA', signal: 'GRAY', reason: 'item not identified' });
  });

  test('should refuse to score without a bid', () => {
    const result = engine.score(TROUT, 0, snapshot(TEN_PRICES));

    expect(result.reason).toBe('no active bid detected');
    expect(result.fairValue).toBeNull();
    expect(result.keyFactors).toEqual([]);
  });

  test('should refuse to score without market data', () => {
    expect(engine.score(TROUT, 40, snapshot([])).reason).toBe('no market data');
  });

  test('should require the minimum number of comparables', () => {
    const result = engine.score(TROUT, 40, snapshot([40, 50]));

    expect(result).toEqual({
      recommendation: 'INSUFFICIENT_DATA',
      signal: 'GRAY',
      confidence: 0,
      reason: 'only 2 comparable sale(s), need 3',
      fairValue: null,
      fairValueRange: null,
      roiPercent: null,
      suggestedMaxBid: null,
      gradeMultiplier: null,
      keyFactors: [],
    });
  });

  test('should spread a single price by a fixed fraction', () => {
    const result = new SignalEngine(1).score({ ...TROUT, grade: null, gradingCompany: null }, 90, snapshot([100]));

    expect(result).toMatchObject({
      recommendation: 'WEAK_BUY',
      signal: 'YELLOW',
      confidence: 0.05,
      fairValue: 100,
      fairValueRange: { low: 80, high: 120 },
      roiPercent: 11.11,
      suggestedMaxBid: 80,
      gradeMultiplier: 1,
    });
    expect(result.keyFactors).toEqual([
      'Limited market data - higher risk',
      'Good profit potential',
      'Ungraded - condition risk',
    ]);
  });

  test('should downgrade a thin sample', () => {
    const result = engine.score({ ...TROUT, grade: null, gradingCompany: null }, 38, snapshot([50, 50, 50, 50, 50]));

    expect(result.roiPercent).toBe(31.58);
    expect(result.recommendation).toBe('BUY');
    expect(result.confidence).toBe(0.35);
  });

  test('should pass on an overpriced bid', () => {
    const result = engine.score({ ...TROUT, grade: null, gradingCompany: null }, 100, snapshot(TEN_PRICES, 10));

    expect(result.recommendation).toBe('PASS');
    expect(result.signal).toBe('RED');
    expect(result.confidence).toBe(0.8);
  });
});
