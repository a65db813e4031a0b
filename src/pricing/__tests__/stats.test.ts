import { emptySnapshot, median, summarize, type SnapshotMeta } from '../stats';
import { TROUT_PRICES, listings } from './fixtures';

const META: SnapshotMeta = {
  query: 'Mike Trout 2023 Topps PSA 10',
  cachedAt: '2026-01-01T00:00:00.000Z',
  filtered: true,
  broadened: false,
  source: 'live',
};

describe('median', () => {
  test('should average the middle pair of an even-length list', () => {
    expect(median([1, 2, 3, 4])).toBe(2.5);
  });

  test('should take the middle of an odd-length list', () => {
    expect(median([1, 5, 9])).toBe(5);
  });

  test('should return 0 for no values', () => {
    expect(median([])).toBe(0);
  });
});

describe('summarize', () => {
  test('should compute statistics over every comparable', () => {
    const snapshot = summarize(listings('2023 Topps Mike Trout PSA 10'), META);

    expect(snapshot.count).toBe(12);
    expect(snapshot.mean).toBe(46.83);
    expect(snapshot.median).toBe(43.5);
    expect(snapshot.min).toBe(30);
    expect(snapshot.max).toBe(70);
    expect(snapshot.stdDev).toBe(12.62);
    expect(snapshot.source).toBe('live');
  });

  test('should retain only the ten most recent prices, ascending', () => {
    const recentFirst = [...TROUT_PRICES].reverse();
    const snapshot = summarize(listings('x', recentFirst), META);

    expect(snapshot.prices).toEqual([35, 38, 40, 42, 45, 50, 55, 60, 65, 70]);
  });

  test('should ignore non-positive prices', () => {
    const snapshot = summarize(listings('x', [0, -5, 20, Number.NaN]), META);
    expect(snapshot.count).toBe(1);
    expect(snapshot.prices).toEqual([20]);
    expect(snapshot.stdDev).toBe(0);
  });

  test('should return an empty snapshot when nothing is priced', () => {
    expect(summarize([], META)).toEqual(emptySnapshot(META));
    expect(emptySnapshot(META)).toMatchObject({ count: 0, prices: [], mean: 0, median: 0 });
  });
});
