import NodeCache from 'node-cache';
import type { LanguageModelPort } from '../core/llm/LanguageModelPort';
import type { Advisory, ItemAttributes, PriceSnapshot } from '../core/types';
import { priceCacheKey } from '../pricing/cacheKey';
import { toErrorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('advisory');

export const DEFAULT_ADVISORY_TTL_SECONDS = 120;

/** One-paragraph rendering for viewers that only show text. */
export function formatAdvisory(advisory: Advisory): string {
  if (advisory.format === 'text') {
    return advisory.reasoning;
  }
  const parts = [advisory.recommendation];
  if (advisory.confidence) parts.push(`(${advisory.confidence} confidence)`);
  if (advisory.maxBidSuggestion !== null) parts.push(`max bid $${advisory.maxBidSuggestion}`);
  const head = parts.join(' ');
  return advisory.reasoning ? `${head}: ${advisory.reasoning}` : head;
}

/**
 * Optional language-model commentary on a deal, memoized per identity and bid.
 * Resolves undefined when no model is configured or the call fails.
 */
export class AdvisoryService {
  private readonly cache: NodeCache;
  private requests = 0;
  private failures = 0;

  constructor(
    private readonly llm: LanguageModelPort | undefined,
    private readonly ttlSeconds: number = DEFAULT_ADVISORY_TTL_SECONDS
  ) {
    this.cache = new NodeCache({ stdTTL: ttlSeconds, checkperiod: ttlSeconds, useClones: true });
  }

  get isAvailable(): boolean {
    return this.llm !== undefined;
  }

  async advise(
    identity: ItemAttributes,
    currentBid: number,
    snapshot: PriceSnapshot
  ): Promise<Advisory | undefined> {
    const llm = this.llm;
    if (!llm || snapshot.count === 0 || !(currentBid > 0)) {
      return undefined;
    }

    const key = `${priceCacheKey(identity)}:${currentBid}`;
    const cached = this.cache.get<Advisory>(key);
    if (cached) {
      return cached;
    }

    this.requests++;
    try {
      const advisory = await llm.advise(identity, currentBid, snapshot);
      if (this.ttlSeconds > 0) {
        this.cache.set(key, advisory);
      }
      return advisory;
    } catch (error) {
      this.failures++;
      logger.warn('Advisory unavailable for this frame', {
        engine: llm.name,
        error: toErrorMessage(error),
      });
      return undefined;
    }
  }

  getStats(): { requests: number; failures: number; cached: number } {
    return { requests: this.requests, failures: this.failures, cached: this.cache.keys().length };
  }

  close(): void {
    this.cache.flushAll();
    this.cache.close();
  }
}
