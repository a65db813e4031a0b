import { v4 as uuidv4 } from 'uuid';
import type { PriceCache } from '../core/pricing/PriceCachePort';
import { ContinuityTracker } from '../fusion/ContinuityTracker';
import { Mutex } from '../utils/mutex';

/**
 * Mutable state owned by one viewer. Nothing here is shared between sessions
 * except, when configured, the persistent price cache and its lock.
 */
export interface SessionContext {
  id: string;
  continuity: ContinuityTracker;
  priceCache: PriceCache;
  priceLock: Mutex;
  startedAt: Date;
}

export interface SessionContextOptions {
  continuityTtlMs: number;
  /** Shared cache and lock; a private pair is used when omitted. */
  shared?: { priceCache: PriceCache; priceLock: Mutex };
  createCache: () => PriceCache;
  id?: string;
  now?: () => Date;
}

export function createSessionContext(options: SessionContextOptions): SessionContext {
  return {
    id: options.id ?? uuidv4(),
    continuity: new ContinuityTracker(options.continuityTtlMs),
    priceCache: options.shared?.priceCache ?? options.createCache(),
    priceLock: options.shared?.priceLock ?? new Mutex(),
    startedAt: (options.now ?? (() => new Date()))(),
  };
}

/** Releases what the session owns. A shared cache is left open. */
export function disposeSessionContext(context: SessionContext, sharedCache?: PriceCache): void {
  context.continuity.reset();
  if (context.priceCache !== sharedCache) {
    context.priceCache.close();
  }
}
