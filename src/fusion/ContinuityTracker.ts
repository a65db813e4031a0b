import { isResolved, type Identity } from '../core/types';

export const DEFAULT_CONTINUITY_TTL_MS = 30_000;

/**
 * Single-slot memory of the last identified item. Bridges frames where the
 * overlay hides the card, for at most `ttlMs`.
 */
export class ContinuityTracker {
  private last?: { identity: Identity; seenAt: number };

  constructor(private readonly ttlMs: number = DEFAULT_CONTINUITY_TTL_MS) {}

  update(current: Identity, now: number): Identity {
    if (isResolved(current)) {
      this.last = { identity: current, seenAt: now };
      return current;
    }
    if (this.last && now - this.last.seenAt < this.ttlMs) {
      return this.last.identity;
    }
    return current;
  }

  reset(): void {
    this.last = undefined;
  }
}
