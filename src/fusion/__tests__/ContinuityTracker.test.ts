import { emptyAttributes, type Identity } from '../../core/types';
import { ContinuityTracker } from '../ContinuityTracker';

function identity(name: string | null): Identity {
  return { ...emptyAttributes(), name, provenance: {}, confidence: 0.5, audioConfidence: 0 };
}

describe('ContinuityTracker', () => {
  test('should remember the last identified item', () => {
    const tracker = new ContinuityTracker(30_000);
    const trout = identity('Mike Trout');

    expect(tracker.update(trout, 1000)).toBe(trout);
    expect(tracker.update(identity(null), 5000)).toBe(trout);
  });

  test('should stop substituting once the TTL has elapsed', () => {
    const tracker = new ContinuityTracker(30_000);
    tracker.update(identity('Mike Trout'), 1000);

    const blank = identity(null);
    expect(tracker.update(blank, 1000 + 29_999).name).toBe('Mike Trout');
    expect(tracker.update(blank, 1000 + 30_000)).toBe(blank);
  });

  test('should replace the remembered item with a newer one', () => {
    const tracker = new ContinuityTracker();
    tracker.update(identity('Mike Trout'), 0);
    tracker.update(identity('Ken Griffey'), 10);

    expect(tracker.update(identity(null), 20).name).toBe('Ken Griffey');
  });

  test('should treat a whitespace name as unidentified', () => {
    const tracker = new ContinuityTracker();
    tracker.update(identity('Mike Trout'), 0);

    expect(tracker.update(identity('   '), 10).name).toBe('Mike Trout');
  });

  test('should forget everything on reset', () => {
    const tracker = new ContinuityTracker();
    tracker.update(identity('Mike Trout'), 0);
    tracker.reset();

    expect(tracker.update(identity(null), 10).name).toBeNull();
  });
});
